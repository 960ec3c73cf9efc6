import type { Tag } from '@models/tag.types';
import { isString, upperCase } from 'lodash-es';
import { createLogger, format, transports } from 'winston';
import type { LogInput } from './logger.types';
const { combine, timestamp, json } = format;

const logger = createLogger({
  level: process.env.TRADEWARD_LOG_LEVEL || 'info',
  format: combine(timestamp(), json()),
  transports: [new transports.Console()],
});

const log = ({ tag, message, level }: LogInput) => {
  logger.log({ level, message: isString(message) ? message : JSON.stringify(message), _tag: upperCase(tag) });
};

export const debug = (tag: Tag, message: unknown) => {
  log({ tag, message, level: 'debug' });
};

export const info = (tag: Tag, message: unknown) => {
  log({ tag, message, level: 'info' });
};

export const warning = (tag: Tag, message: unknown) => {
  log({ tag, message, level: 'warn' });
};

export const error = (tag: Tag, message: unknown) => {
  log({ tag, message, level: 'error' });
};

