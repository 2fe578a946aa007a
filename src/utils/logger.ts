import winston from 'winston';
import path from 'path';

/**
 * Winston Logger Configuration
 * Levels: ERROR, WARN, INFO, DEBUG
 * Components: email-view, template-view, transport, framework
 */

const logFormat = winston.format.combine(
  winston.format.timestamp({ format: 'YYYY-MM-DD HH:mm:ss.SSS' }),
  winston.format.errors({ stack: true }),
  winston.format.printf(({ level, message, timestamp, stack, component, ...metadata }) => {
    const comp = component ? `[${component}]` : '';
    let log = `${timestamp} [${level.toUpperCase().padEnd(7)}]${comp} ${message}`;

    // Metadata, minus winston's own fields
    const metaKeys = Object.keys(metadata).filter(k => !['service', 'level', 'timestamp'].includes(k));
    if (metaKeys.length > 0) {
      const metaObj: Record<string, unknown> = {};
      metaKeys.forEach(k => metaObj[k] = metadata[k]);
      log += ` ${JSON.stringify(metaObj)}`;
    }

    if (stack) {
      log += `\n${stack}`;
    }

    return log;
  })
);

const coloredFormat = winston.format.combine(
  winston.format.colorize({ all: true }),
  winston.format.timestamp({ format: 'YYYY-MM-DD HH:mm:ss.SSS' }),
  winston.format.printf(({ level, message, timestamp, component, ...metadata }) => {
    const comp = component ? `[${component}]` : '';
    let log = `${timestamp} [${level}]${comp} ${message}`;

    const metaKeys = Object.keys(metadata).filter(k => !['service', 'level', 'timestamp', 'stack'].includes(k));
    if (metaKeys.length > 0) {
      const metaObj: Record<string, unknown> = {};
      metaKeys.forEach(k => metaObj[k] = metadata[k]);
      log += ` ${JSON.stringify(metaObj)}`;
    }

    return log;
  })
);

const transports: winston.transport[] = [
  new winston.transports.Console({
    format: coloredFormat
  })
];

// File logs only when the host application asks for them
if (process.env.LOG_DIR) {
  transports.push(
    new winston.transports.File({
      filename: path.join(process.env.LOG_DIR, 'error.log'),
      level: 'error',
      maxsize: 5242880, // 5MB
      maxFiles: 5
    }),
    new winston.transports.File({
      filename: path.join(process.env.LOG_DIR, 'email.log'),
      maxsize: 5242880, // 5MB
      maxFiles: 5
    })
  );
}

const logger = winston.createLogger({
  level: process.env.LOG_LEVEL || 'info',
  format: logFormat,
  defaultMeta: { service: 'express-email-view' },
  transports
});

// Namespace loggers for different components
export const viewLogger = logger.child({ component: 'email-view' });
export const templateLogger = logger.child({ component: 'template-view' });
export const transportLogger = logger.child({ component: 'transport' });
export const frameworkLogger = logger.child({ component: 'framework' });

export default logger;
