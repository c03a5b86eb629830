import pino from 'pino';
import { getConfig } from './config.js';

const cfg = getConfig();

// stdout carries the stdio MCP transport, so logs go to stderr.
export const logger = pino(
  {
    level: cfg.logLevel,
    base: undefined,
    redact: ['req.headers.authorization', 'req.headers["x-api-key"]'],
  },
  pino.destination(2),
);

export type Logger = typeof logger;
