// Library entry: the lock engine without the HTTP surface

export * from './domains/lock/index.js';
export {
  LockwardenError,
  ValidationError,
  LockFilePresentError,
  LockFileNotPresentError,
  MalformedLockFileError,
  InvalidActionError,
  InvalidNameError,
  LockVerificationError,
  type ErrorStatus,
} from './shared/errors/index.js';
