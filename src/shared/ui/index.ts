/**
 * UI utilities for terminal output: re-export hub.
 */

export {
  LogManager,
  setLogLevel,
  blankLine,
  debug,
  info,
  warn,
  error,
  success,
  header,
  status,
  list,
} from './LogManager.js';
