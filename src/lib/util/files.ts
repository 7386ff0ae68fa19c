
import type { Stats } from 'node:fs';
import fs from 'node:fs';

import { prim } from './validate-primitives';

export const files = {
  checkDir: checkDir,
  mkdirIfNotExist: mkdirIfNotExist,
} as const;

function checkDir(dirPath: string): boolean {
  let stats: Stats;
  try {
    stats = fs.statSync(dirPath);
  } catch(e) {
    if(prim.isObject(e) && e.code === 'ENOENT') {
      return false;
    }
    throw e;
  }
  return stats.isDirectory();
}

/*
  returns the first directory created, undefined if dirPath already existed
_*/
function mkdirIfNotExist(dirPath: string): string | undefined {
  if(checkDir(dirPath)) {
    return;
  }
  return fs.mkdirSync(dirPath, { recursive: true });
}
