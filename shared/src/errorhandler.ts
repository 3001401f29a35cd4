import { Logger } from './utils/Logger';
import { ServiceError, RequestValidationError } from './errors/ServiceError';

const defaultLogger = new Logger('ErrorHandler');

/**
 * Log the details of a failed pipeline step.
 *
 * The error is only reported, never swallowed or retried: callers rethrow it afterwards.
 */
export function reportError(error: unknown, logger: Logger = defaultLogger): void {
  if (error instanceof ServiceError) {
    logger.error(`${error.service} call failed (${error.category})`, error, {
      status: error.status,
      category: error.category,
      details: error.details
    });
    return;
  }

  if (error instanceof RequestValidationError) {
    logger.error('Request rejected before sending', error, { field: error.field });
    return;
  }

  if (error instanceof Error) {
    const code = 'code' in error ? error.code : undefined;
    logger.error(`${error.name}: ${error.message}`, error, code !== undefined ? { code } : undefined);
    return;
  }

  logger.error(`Non-error value thrown: ${String(error)}`);
}
