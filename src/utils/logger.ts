import { Request, Response, NextFunction } from 'express';
import winston from 'winston';
import { config } from '@/utils/config';

const { combine, timestamp, errors, splat, json, colorize, printf } = winston.format;

const devFormat = printf(({ level, message, timestamp: ts, stack, ...meta }) => {
  const rest = Object.keys(meta).length ? ` ${JSON.stringify(meta)}` : '';
  return `${ts} ${level}: ${stack ?? message}${rest}`;
});

export const logger = winston.createLogger({
  level: config.logLevel,
  format: combine(timestamp(), errors({ stack: true }), splat(), json()),
  transports: [
    new winston.transports.Console({
      silent: config.nodeEnv === 'test',
      format: config.nodeEnv === 'production' ? undefined : combine(colorize(), timestamp(), errors({ stack: true }), devFormat),
    }),
  ],
});

// morgan writes access lines through here
export const accessLogStream = {
  write: (line: string) => {
    logger.http(line.trim());
  },
};

export function requestLogger(req: Request, res: Response, next: NextFunction) {
  const started = Date.now();
  res.on('finish', () => {
    logger.debug('Request completed', {
      method: req.method,
      path: req.originalUrl,
      status: res.statusCode,
      durationMs: Date.now() - started,
    });
  });
  next();
}

export function errorLogger(error: unknown, req: Request, _res: Response, next: NextFunction) {
  logger.error(`Error handling ${req.method} ${req.originalUrl}:`, error);
  next(error);
}
