import pino from 'pino';
import { config } from '../config';

export const logger = pino({
  name: 'detection-orchestrator',
  level: config.logging.level,
  formatters: {
    level: (label) => {
      return { level: label };
    },
  },
  timestamp: pino.stdTimeFunctions.isoTime,
  serializers: {
    err: pino.stdSerializers.err,
  },
  ...(config.logging.pretty && config.environment === 'development'
    ? {
        transport: {
          target: 'pino-pretty',
          options: {
            colorize: true,
            translateTime: 'SYS:standard',
            ignore: 'pid,hostname',
          },
        },
      }
    : {}),
});

// Create child loggers for specific components
export const registryLogger = logger.child({ component: 'registry' });
export const breakerLogger = logger.child({ component: 'breaker' });
export const healthLogger = logger.child({ component: 'health' });
export const balancerLogger = logger.child({ component: 'balancer' });
export const dispatcherLogger = logger.child({ component: 'dispatcher' });
export const metricsLogger = logger.child({ component: 'metrics' });
export const historyLogger = logger.child({ component: 'history' });
export const engineLogger = logger.child({ component: 'engine-client' });
export const httpLogger = logger.child({ component: 'http' });

export default logger;
