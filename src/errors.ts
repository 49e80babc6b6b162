import { AbstractError } from '@matrixai/errors';

class ErrorVFS<T> extends AbstractError<T> {
  static description = 'VFS errors';
}

class ErrorVFSUndefinedBehaviour<T> extends ErrorVFS<T> {
  static description = 'You should never see this error';
}

class ErrorVFSNotFound<T> extends ErrorVFS<T> {
  static description = 'The requested resource does not exist';
}

class ErrorVFSNoContext<T> extends ErrorVFSNotFound<T> {
  static description = 'No registered context covers the identifier';
}

class ErrorVFSInvariantViolation<T> extends ErrorVFS<T> {
  static description = 'The operation would break a structural invariant';
}

class ErrorVFSDuplicateChild<T> extends ErrorVFS<T> {
  static description = 'A child with the same name is already registered';
}

class ErrorVFSIO<T> extends ErrorVFS<T> {
  static description = 'Underlying I/O operation failed';
}

class ErrorVFSInvalidPath<T> extends ErrorVFS<T> {
  static description = 'The path is not valid for the operation';
}

class ErrorVFSMountExists<T> extends ErrorVFS<T> {
  static description = 'A backend is already mounted at this mount point';
}

class ErrorHandleCache<T> extends ErrorVFS<T> {
  static description = 'Handle cache errors';
}

class ErrorHandleCacheNotRunning<T> extends ErrorHandleCache<T> {
  static description = 'The handle cache has not been started';
}

class ErrorHandleCacheDuplicateContext<T> extends ErrorHandleCache<T> {
  static description = 'The context is already registered with this cache';
}

class ErrorHandleCacheRegistrationForbidden<T> extends ErrorHandleCache<T> {
  static description = 'Context registration is owned by the underlying cache';
}

export {
  ErrorVFS,
  ErrorVFSUndefinedBehaviour,
  ErrorVFSNotFound,
  ErrorVFSNoContext,
  ErrorVFSInvariantViolation,
  ErrorVFSDuplicateChild,
  ErrorVFSIO,
  ErrorVFSInvalidPath,
  ErrorVFSMountExists,
  ErrorHandleCache,
  ErrorHandleCacheNotRunning,
  ErrorHandleCacheDuplicateContext,
  ErrorHandleCacheRegistrationForbidden,
};
