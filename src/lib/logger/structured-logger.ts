/**
 * Structured Logger with Pino
 *
 * - Fast JSON logging with Pino
 * - Pretty console output in DEV
 * - Optional daily rotated log files
 * - Automatic secret redaction
 * - Request tracking via child loggers
 */

import pino from 'pino';
import * as rfs from 'rotating-file-stream';
import { PinoPretty } from 'pino-pretty';
import path from 'path';
import fs from 'fs';
import { getLoggingConfig } from '../../config/logging.config.js';

const config = getLoggingConfig();

const streams: pino.StreamEntry[] = [];

if (config.console) {
  streams.push({
    level: config.level,
    stream: config.pretty
      ? PinoPretty({
          colorize: true,
          translateTime: 'SYS:HH:MM:ss',
          ignore: 'pid,hostname',
        })
      : process.stdout,
  });
}

if (config.toFile) {
  const logsDir = path.resolve(process.cwd(), config.dir);
  if (!fs.existsSync(logsDir)) {
    fs.mkdirSync(logsDir, { recursive: true });
  }

  streams.push({
    level: config.level,
    stream: rfs.createStream('server.log', {
      interval: '1d',
      path: logsDir,
      maxFiles: config.rotateDays,
      compress: 'gzip',
    }),
  });
}

export const logger = pino(
  {
    level: streams.length > 0 ? config.level : 'silent',
    redact: {
      paths: config.redactFields,
      censor: '[REDACTED]',
    },
    formatters: {
      level: (label) => ({ level: label }),
    },
    timestamp: pino.stdTimeFunctions.isoTime,
  },
  pino.multistream(streams)
);

export type Logger = pino.Logger;
