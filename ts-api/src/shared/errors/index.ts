// Global error types

/** HTTP statuses the API maps lock errors onto */
export type ErrorStatus = 400 | 404 | 409 | 422 | 500;

export class LockwardenError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    public readonly statusCode: ErrorStatus = 500
  ) {
    super(message);
    this.name = 'LockwardenError';
  }
}

export class ValidationError extends LockwardenError {
  constructor(message: string) {
    super(message, 'VALIDATION_ERROR', 400);
    this.name = 'ValidationError';
  }
}

export class LockFilePresentError extends LockwardenError {
  constructor(public readonly lockPath: string) {
    super(
      `Lock file already present. Please verify status of lock file: ${lockPath}`,
      'LOCK_FILE_PRESENT',
      409
    );
    this.name = 'LockFilePresentError';
  }
}

export class LockFileNotPresentError extends LockwardenError {
  constructor(public readonly lockPath: string) {
    super(
      `Lock file expected but not present. Please verify status of lock file: ${lockPath}`,
      'LOCK_FILE_NOT_PRESENT',
      409
    );
    this.name = 'LockFileNotPresentError';
  }
}

export class MalformedLockFileError extends LockwardenError {
  constructor(public readonly lockPath: string, reason: string) {
    super(`Malformed lock file ${lockPath}: ${reason}`, 'MALFORMED_LOCK_FILE', 422);
    this.name = 'MalformedLockFileError';
  }
}

export class InvalidActionError extends LockwardenError {
  constructor(action: unknown) {
    super(
      `Lock action not actionable: ${String(action)}. Valid actions: status, lock, unlock`,
      'INVALID_ACTION',
      400
    );
    this.name = 'InvalidActionError';
  }
}

export class InvalidNameError extends LockwardenError {
  constructor(name: string, reason: string) {
    super(`Invalid lock object name ${JSON.stringify(name)}: ${reason}`, 'INVALID_NAME', 400);
    this.name = 'InvalidNameError';
  }
}

/** The filesystem did not reflect a lock or unlock that reported success */
export class LockVerificationError extends LockwardenError {
  constructor(public readonly lockPath: string, action: 'lock' | 'unlock') {
    super(
      action === 'lock'
        ? `Lock file missing after lock: ${lockPath}`
        : `Lock file still present after unlock: ${lockPath}`,
      'LOCK_VERIFICATION_FAILED',
      500
    );
    this.name = 'LockVerificationError';
  }
}
