import pino from 'pino';
import { config } from './config.js';

const usePrettyTransport = config.nodeEnv !== 'production' && config.nodeEnv !== 'test';

export const logger = pino({
  level: config.logLevel,
  transport: usePrettyTransport
    ? {
        target: 'pino-pretty',
        options: {
          colorize: true,
          translateTime: 'HH:MM:ss',
          singleLine: true,
        },
      }
    : undefined,
});

export default logger;
