import pino from 'pino';
import { env } from '../config/env';

export const logger = pino({
  level: env.logLevel,
  formatters: {
    level: (label) => ({ level: label }),
  },
  timestamp: pino.stdTimeFunctions.isoTime,
  serializers: { err: pino.stdSerializers.err },
  base: { service: 'tenant-support-router', env: env.nodeEnv },
});

/** Logger bound to one routed message */
export function requestLogger(requestId: string, tenantId: string, sessionId: string): pino.Logger {
  return logger.child({ requestId, tenantId, sessionId });
}
