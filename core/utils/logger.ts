import winston from 'winston';
import { loggingConfig, type LoggingService } from '@core/config/logging';

winston.addColors(loggingConfig.colors);

const consoleFormat = winston.format.combine(
  winston.format.timestamp({ format: loggingConfig.format.timestamp }),
  winston.format.colorize({ all: loggingConfig.format.colorize }),
  winston.format.printf(({ level, message, timestamp, service, ...metadata }) => {
    let msg = `${String(timestamp)} [${level}]${service ? ` [${String(service)}]` : ''} ${String(message)}`;
    if (Object.keys(metadata).length > 0) {
      msg += '\n' + JSON.stringify(metadata, null, 2);
    }
    return msg;
  })
);

/**
 * Level for one service. `LOG_LEVEL` wins, tests stay quiet unless
 * `TEST_LOG_LEVEL` is set, and `TAGWEAVE_DEBUG=true` turns on debug output.
 */
export function getServiceLogLevel(serviceName: LoggingService): string {
  if (process.env.LOG_LEVEL) {
    return process.env.LOG_LEVEL;
  }

  if (process.env.NODE_ENV === 'test') {
    return process.env.TEST_LOG_LEVEL || 'error';
  }

  if (process.env.TAGWEAVE_DEBUG === 'true') {
    return 'debug';
  }

  return loggingConfig.services[serviceName].level;
}

/**
 * Create a service-specific winston logger
 */
export function createServiceLogger(serviceName: LoggingService): winston.Logger {
  const silent = process.env.NODE_ENV === 'test' && !process.env.TEST_LOG_LEVEL;

  return winston.createLogger({
    level: getServiceLogLevel(serviceName),
    levels: loggingConfig.levels,
    defaultMeta: { service: serviceName },
    transports: [
      new winston.transports.Console({
        format: consoleFormat,
        // All levels to stderr; stdout carries rendered output
        stderrLevels: Object.keys(loggingConfig.levels),
        silent
      })
    ]
  });
}

export const scannerLogger = createServiceLogger('scanner');
export const resolutionLogger = createServiceLogger('resolution');
export const postProcessLogger = createServiceLogger('postprocess');
export const registryLogger = createServiceLogger('registry');
export const configLogger = createServiceLogger('config');
export const cliLogger = createServiceLogger('cli');
