export {
  getErrorMessage,
  toError,
  isRetryableError,
  formatErrorForLog,
} from './error-handling';
