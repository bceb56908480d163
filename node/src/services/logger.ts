// Structured logging for the bot
import { Logger } from 'tslog';

const LEVELS: Record<string, number> = {
  debug: 2,
  info: 3,
  warn: 4,
  error: 5,
};

export const logger = new Logger({
  name: 'flight-bot',
  minLevel: LEVELS[process.env.LOG_LEVEL ?? 'info'] ?? 3,
  prettyLogTemplate: '{{yyyy}}-{{mm}}-{{dd}} {{hh}}:{{MM}}:{{ss}} {{logLevelName}} ',
  type: process.env.NODE_ENV === 'test' ? 'hidden' : 'pretty',
});
