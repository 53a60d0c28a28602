import winston from 'winston';
import LokiTransport from 'winston-loki';
import os from 'os';
import { APP_NAME, LOG_LEVEL } from './Constants';

const logger = winston.createLogger({
  level: LOG_LEVEL,
  format: winston.format.json(),
  transports: [
    new winston.transports.Console({
      format: winston.format.printf((log) => `${APP_NAME} | ${log.level} | ${log.message}`),
      level: LOG_LEVEL
    })
  ]
});

if (process.env.LOKI_URI && process.env.LOKI_LOGIN && process.env.LOKI_PWD) {
  logger.add(
    new LokiTransport({
      level: 'debug',
      host: process.env.LOKI_URI,
      format: winston.format.printf((log) => `${log.message}`),
      json: true,
      labels: getLokiLabels(),
      basicAuth: `${process.env.LOKI_LOGIN}:${process.env.LOKI_PWD}`,
      useWinstonMetaAsLabels: false,
      batching: true
    })
  );
}

function getLokiLabels() {
  return {
    app: APP_NAME,
    host: os.hostname()
  };
}

function formatArgs(msg: string, args: unknown[]): string {
  if (args.length == 0) {
    return msg;
  }

  return `${msg} ${args.map((_) => (_ instanceof Error ? _.stack ?? _.message : String(_))).join(' ')}`;
}

export function Log(msg: string, ...args: unknown[]) {
  logger.info(formatArgs(msg, args));
}

export function Debug(msg: string, ...args: unknown[]) {
  logger.debug(formatArgs(msg, args));
}

export function Warn(msg: string, ...args: unknown[]) {
  logger.warn(formatArgs(msg, args));
}

export function Err(msg: string, ...args: unknown[]) {
  logger.error(formatArgs(msg, args));
}

export default logger;
