import winston from 'winston';
import config from '../config/index.js';

const transports: winston.transport[] = [
  new winston.transports.Console({
    format: winston.format.combine(
      winston.format.colorize(),
      winston.format.simple()
    ),
  }),
];

// Workflow log
if (config.logging.file) {
  transports.push(new winston.transports.File({ filename: config.logging.file }));
}

const logger = winston.createLogger({
  level: config.logging.level,
  silent: config.nodeEnv === 'test',
  format: winston.format.combine(
    winston.format.timestamp(),
    winston.format.errors({ stack: true }),
    winston.format.json()
  ),
  defaultMeta: { service: 'device-runner' },
  transports,
});

export function deviceLogger(device: string): winston.Logger {
  return logger.child({ device });
}

export default logger;
