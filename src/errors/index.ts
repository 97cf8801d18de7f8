/**
 * Error handling module for godoc-extract
 *
 * Usage:
 *   import { ConfigError, handleError } from './errors/index.js';
 *
 *   throw new ConfigError('Invalid option', 'Try: godoc-extract config list');
 */

// Error types
export {
  CLIError,
  FileNotFoundError,
  ConfigError,
  StoreError,
  MetadataUnavailableError,
  ValidationError,
} from './types.js';

// Error handling utilities
export {
  formatError,
  getExitCode,
  handleError,
  createGlobalErrorHandler,
  type ErrorHandlerOptions,
  type ErrorOutput,
} from './handler.js';
