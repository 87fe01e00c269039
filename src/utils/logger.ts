import winston from 'winston';

// Define log levels
const levels = {
  error: 0,
  warn: 1,
  info: 2,
  http: 3,
  debug: 4,
};

// Define colors for each level
const colors = {
  error: 'red',
  warn: 'yellow',
  info: 'green',
  http: 'magenta',
  debug: 'white',
};

winston.addColors(colors);

const RESERVED_KEYS = ['timestamp', 'level', 'message', 'stack'];

// Explicit LOG_LEVEL wins; otherwise verbose in development, quiet in test
const level = (): string => {
  if (process.env.LOG_LEVEL) {
    return process.env.LOG_LEVEL;
  }

  const env = process.env.NODE_ENV || 'development';
  if (env === 'test') {
    return 'error';
  }
  return env === 'development' ? 'debug' : 'info';
};

const renderLine = (info: winston.Logform.TransformableInfo): string => {
  const meta = Object.fromEntries(
    Object.entries(info).filter(([key]) => !RESERVED_KEYS.includes(key))
  );
  const stack = typeof info.stack === 'string' ? `\n${info.stack}` : '';
  const extra = Object.keys(meta).length > 0 ? `\n${JSON.stringify(meta, null, 2)}` : '';

  return `${String(info.timestamp)} ${info.level}: ${String(info.message)}${stack}${extra}`;
};

const timestamp = winston.format.timestamp({ format: 'YYYY-MM-DD HH:mm:ss:ms' });

const consoleFormat = winston.format.combine(
  timestamp,
  winston.format.colorize({ all: true }),
  winston.format.printf(renderLine),
);

const fileFormat = winston.format.combine(
  timestamp,
  winston.format.printf(renderLine),
);

const transports: winston.transport[] = [
  new winston.transports.Console({
    level: level(),
    format: consoleFormat,
  }),
];

if (process.env.LOG_FILE) {
  transports.push(
    new winston.transports.File({
      filename: process.env.LOG_FILE,
      level: process.env.LOG_LEVEL || 'info',
      format: fileFormat,
    })
  );
}

export const logger = winston.createLogger({
  level: level(),
  levels,
  format: consoleFormat,
  transports,
});
