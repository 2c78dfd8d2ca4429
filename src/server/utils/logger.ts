import winston from 'winston';

const isTest = process.env.NODE_ENV === 'test' || process.env.VITEST === 'true';

// Errors passed as metadata (`{ error }`) are flattened so they survive JSON output
const errorFields = winston.format((info) => {
  for (const [key, value] of Object.entries(info)) {
    if (value instanceof Error) {
      const code: unknown = Reflect.get(value, 'code');
      info[key] = {
        name: value.name,
        message: value.message,
        ...(code !== undefined && { code }),
        stack: value.stack
      };
    }
  }
  return info;
});

const readable = winston.format.printf(({ level, message, timestamp, service: _service, ...meta }) => {
  const details = Object.keys(meta).length ? ` ${JSON.stringify(meta)}` : '';
  return `${timestamp} ${level} ${message}${details}`;
});

const logger = winston.createLogger({
  level: process.env.LOG_LEVEL || 'info',
  silent: isTest,
  format: winston.format.combine(winston.format.timestamp(), errorFields()),
  defaultMeta: { service: 'booster-forge' },
  transports: [
    new winston.transports.Console({
      format: process.env.NODE_ENV === 'production'
        ? winston.format.json()
        : winston.format.combine(winston.format.colorize(), readable)
    })
  ]
});

export default logger;
