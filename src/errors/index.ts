export {
  ManagerError,
  NetworkError,
  NotFoundError,
  ConflictError,
  ValidationError,
  AuthError,
  ProcessError,
  IOError,
  createError,
  isManagerError,
  isErrnoException,
  asError,
  errorMessage,
  toManagerError,
  withContext,
} from './manager-errors';
export type { ErrorKind, ManagerErrorOptions } from './manager-errors';
export { EXIT_CODES, exitCodeFor, formatError, handleError } from './error-handler';
