import winston from 'winston';
import { config } from './config';

const SERVICE_NAME = 'modscope';

const fileFormat = winston.format.combine(
  winston.format.timestamp({
    format: 'YYYY-MM-DD HH:mm:ss',
  }),
  winston.format.errors({ stack: true }),
  winston.format.json()
);

const consoleFormat = winston.format.combine(
  winston.format.colorize(),
  winston.format.timestamp({
    format: 'HH:mm:ss',
  }),
  winston.format.printf(({ timestamp, level, message, component, ...meta }) => {
    // Only small metadata makes it to the console; the file transport keeps everything
    const essentialMeta: Record<string, unknown> = {};
    for (const [key, value] of Object.entries(meta)) {
      if (key !== 'service') {
        essentialMeta[key] = value;
      }
    }

    let output = `${timestamp} [${level}]: ${message}`;

    if (typeof component === 'string' && component !== SERVICE_NAME) {
      output += ` (${component})`;
    }

    if (Object.keys(essentialMeta).length > 0) {
      const serialized = JSON.stringify(essentialMeta);
      if (serialized.length < 200) {
        output += ` ${serialized}`;
      }
    }

    return output;
  })
);

// Console output goes to stderr so rendered graphs on stdout stay clean
export const logger = winston.createLogger({
  level: config.logging.level,
  defaultMeta: { service: SERVICE_NAME },
  transports: [
    new winston.transports.Console({
      format: consoleFormat,
      stderrLevels: ['error', 'warn', 'info', 'http', 'verbose', 'debug', 'silly'],
      silent: config.nodeEnv === 'test',
    }),
  ],
});

if (config.logging.file) {
  logger.add(
    new winston.transports.File({
      filename: config.logging.file,
      format: fileFormat,
      maxsize: 5 * 1024 * 1024, // 5MB
      maxFiles: 5,
    })
  );
}

// Create child loggers for different components
export const createComponentLogger = (component: string): winston.Logger => {
  return logger.child({ component });
};

export const setLogLevel = (level: string): void => {
  logger.level = level;
  for (const transport of logger.transports) {
    transport.level = level;
  }
};

export const flushLogs = async (): Promise<void> => {
  return new Promise(resolve => {
    setImmediate(() => {
      setTimeout(resolve, 50);
    });
  });
};
