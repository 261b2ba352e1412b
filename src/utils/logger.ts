import winston from 'winston';
import fs from 'fs';
import { config } from './config.js';

const isTest = process.env.NODE_ENV === 'test';

export const logger = winston.createLogger({
  level: config.logging.level,
  silent: isTest,
  format: winston.format.combine(
    winston.format.timestamp(),
    winston.format.printf(({ timestamp, level, message }) => {
      return `${timestamp} [${level.toUpperCase()}]: ${message}`;
    })
  ),
  transports: [
    new winston.transports.Console({
      format: winston.format.combine(
        winston.format.colorize(),
        winston.format.printf(({ timestamp, level, message }) => {
          return `${timestamp} [${level}]: ${message}`;
        })
      ),
    }),
  ],
});

if (!isTest) {
  // Ensure data directory exists
  if (!fs.existsSync(config.paths.dataDir)) {
    fs.mkdirSync(config.paths.dataDir, { recursive: true });
  }

  logger.add(
    new winston.transports.File({
      filename: config.paths.logFile,
      maxsize: 5 * 1024 * 1024,
      maxFiles: 3,
    })
  );
}
