export { getErrorMessage } from './error.js';
export { createLogger, type Logger } from './debug.js';
