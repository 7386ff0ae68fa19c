
/*
copy pino.LogFn, w/o extra rest args
_*/
type SmLogFn = {
  (obj: unknown, msg?: string): void;
  (msg: string): void;
}

/* what commands get handed instead of pino itself */
export type SmLogger = {
  debug: SmLogFn;
  info: SmLogFn;
  warn: SmLogFn;
  error: SmLogFn;
} & {};
