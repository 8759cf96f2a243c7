import pino from 'pino';
import { CONFIG } from './config';

/**
 * Process-wide structured logger. Call as `logger.info({ domain }, 'message')`.
 */
const logger = pino({
  name: 'ct-subdomain-watcher',
  level: process.env.NODE_ENV === 'test' ? 'silent' : CONFIG.LOG_LEVEL,
});

export default logger;
