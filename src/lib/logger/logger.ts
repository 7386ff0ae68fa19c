
import pino from 'pino';
import path from 'node:path';
import {
  APP_LOGGER_NAME,
  LOG_DIR_PATH,
  LOG_FILE_EXT,
} from '../../constants';
import { smConfig } from '../../config';
import { files } from '../util/files';

const dev_env = smConfig.isDevEnv();

const level = (dev_env)
  ? 'debug'
  : 'info'
;

/*
  Base application logger. Goes to logs/, and to stderr in dev.
_*/
export const logger = initLogger();

function initLogger(): pino.Logger {
  let opts: pino.LoggerOptions;
  let streams: pino.StreamEntry[];
  let logFilePath: string;
  let errorLogFilePath: string;

  files.mkdirIfNotExist(LOG_DIR_PATH);

  logFilePath = [
    LOG_DIR_PATH,
    `${APP_LOGGER_NAME}.${LOG_FILE_EXT}`,
  ].join(path.sep);
  errorLogFilePath = [
    LOG_DIR_PATH,
    `${APP_LOGGER_NAME}.error.${LOG_FILE_EXT}`,
  ].join(path.sep);
  streams = [
    { level: 'error', stream: fileTransport(errorLogFilePath) },
    { level: level, stream: fileTransport(logFilePath) },
  ];
  if(dev_env) {
    /* stdout carries command output, keep dev logs on stderr _*/
    streams.push({ level: level, stream: process.stderr });
  }
  opts = {
    level,
    formatters: {
      level: (label) => {
        return {
          level: label.toLocaleUpperCase(),
        };
      },
      bindings: (bindings) => {
        return {
          pid: bindings.pid,
        };
      },
    },
    timestamp: pino.stdTimeFunctions.isoTime,
  };
  return pino(opts, pino.multistream(streams));
}

function fileTransport(destination: string): pino.DestinationStream {
  return pino.transport({
    target: 'pino/file',
    options: {
      destination,
    },
  });
}
