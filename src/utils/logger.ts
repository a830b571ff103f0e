import pino from 'pino';
import settings from '../config/settings';

const isTest = process.env.NODE_ENV === 'test';

// Use pino-pretty for development, standard JSON for production
const logger = pino({
  level: settings.logLevel,
  ...(process.env.NODE_ENV !== 'production' && !isTest && {
    transport: {
      target: 'pino-pretty',
      options: {
        colorize: true,
        translateTime: 'SYS:yyyy-mm-dd HH:MM:ss',
        ignore: 'pid,hostname'
      }
    }
  })
});

export default logger;
