import pino from 'pino';
import { config, isTest } from './config.js';

export const logger = pino({
  name: config.service.name,
  level: isTest() ? 'silent' : config.logLevel,
});
