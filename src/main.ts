#!/usr/bin/env node
/* this should remain the first import */
import 'source-map-support/register';
import assert from 'node:assert';
import { PROC_NAME } from './constants';
import type { CmdCtx } from './cmd/cmd-ctx';
import { cmdArgs } from './cmd/util/cmd-args';

const cmd_map = {
  sun: 'sun', // sunrise / sunset times
  mode: 'mode', // dark or light
} as const;
assert(Object.entries(cmd_map).every(([ key, val ]) => {
  return key === val;
}));

type SmCommand = keyof typeof cmd_map;
type SmArgs = {
  cmd: SmCommand;
  rest: string[];
} & {};

main().catch((e) => {
  console.error(e);
  process.exitCode = 1;
});

async function main() {
  setProcName();
  let smArgs = parseArgs();
  if(smArgs === undefined) {
    printCmds();
    return;
  }
  let ctx = await getCtx();
  try {
    switch(smArgs.cmd) {
      case cmd_map.sun:
        (await import('./cmd/sun/sun-cmd')).sunCmdMain(ctx, smArgs.rest);
        break;
      case cmd_map.mode:
        (await import('./cmd/mode/mode-cmd')).modeCmdMain(ctx, smArgs.rest);
        break;
    }
  } catch(e) {
    ctx.logger.error(e);
    throw e;
  }
}

/*
  logger opens its log files on import, only load it when running a command
_*/
async function getCtx(): Promise<CmdCtx> {
  let { logger } = await import('./lib/logger/logger');
  return {
    logger,
    write: (str) => {
      process.stdout.write(str);
    },
  };
}

function printCmds() {
  let outLines: string[] = [];
  let cmdStrs: string[] = [ ...Object.keys(cmd_map) ];
  outLines.push('commands:');
  outLines.push(`  ${cmdStrs.join(', ')}`);
  outLines.push(...cmdArgs.usage());
  process.stdout.write(`${outLines.join('\n')}\n`);
}

function parseArgs(): SmArgs | undefined {
  let args: string[];
  let firstArg: string;
  args = process.argv.slice(2);
  if(args.length < 1) {
    return;
  }
  firstArg = args[0];
  if(!checkSmCommand(firstArg)) {
    return;
  }
  return {
    cmd: firstArg,
    rest: args.slice(1),
  };
}
function checkSmCommand(cmdStr: string): cmdStr is SmCommand {
  let cmdStrs: readonly string[] = Object.values(cmd_map);
  return cmdStrs.includes(cmdStr);
}

function setProcName() {
  process.title = PROC_NAME;
}
