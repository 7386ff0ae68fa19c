
import type { SmLogger } from '../lib/logger/sm-logger';

export type CmdCtx = {
  logger: SmLogger;
  /* command output, stdout in main _*/
  write: (str: string) => void;
} & {};
