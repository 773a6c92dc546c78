/**
 * Error module exports
 */

export { CliError, ConfigError, InputError, ServiceError, resolveAbsolutePath } from './cli-errors.js';

export {
  formatError,
  handleError,
  toCliError,
} from './handler.js';
