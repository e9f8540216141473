export { DEBUG_LOW, DEBUG_HIGH, type Logger, silentLogger } from './logger.js';
