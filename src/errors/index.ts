/**
 * Unified Error System Export
 *
 * All application errors should be imported from this file.
 */

// Core error system
export {
  ApplicationError,
  ErrorCode,
  type ErrorContext,
} from './ApplicationError.js';

// File system errors
export {
  FileSystemError,
  FileNotFoundError,
  FileWriteError,
  DirectoryUnavailableError,
  PlaylistMissingError,
  ExclusionListMissingError,
} from './ApplicationError.js';

// Configuration errors
export { ConfigurationError } from './ApplicationError.js';

// System errors
export {
  SystemError,
  ProcessError,
  DependencyError,
  MissingProgramError,
} from './ApplicationError.js';
