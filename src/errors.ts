export class DotplaceError extends Error {
  public readonly code: number;

  constructor(message: string, code: number) {
    super(message);
    this.code = code;
    this.name = new.target.name;
  }
}

export const ExitCodes = {
  Success: 0,
  Failure: 1,
  Usage: 2,
  Validation: 3,
  Conflict: 4,
  Filesystem: 5
} as const;

export class InvalidPathError extends DotplaceError {
  constructor(message: string) {
    super(message, ExitCodes.Validation);
  }
}

export class SourceNotFoundError extends DotplaceError {
  public readonly path: string;

  constructor(sourcePath: string) {
    super(`Source not found: ${sourcePath}`, ExitCodes.Validation);
    this.path = sourcePath;
  }
}

export class PermissionError extends DotplaceError {
  public readonly path: string;

  constructor(message: string, targetPath: string) {
    super(message, ExitCodes.Filesystem);
    this.path = targetPath;
  }
}

export class IOError extends DotplaceError {
  public readonly path: string;
  public readonly errno: string | null;

  constructor(message: string, targetPath: string, errno: string | null = null) {
    super(message, ExitCodes.Filesystem);
    this.path = targetPath;
    this.errno = errno;
  }
}

export class DestinationDivergedError extends DotplaceError {
  public readonly path: string;

  constructor(destPath: string) {
    super(`Destination modified since sync: ${destPath}`, ExitCodes.Conflict);
    this.path = destPath;
  }
}

export function isErrnoException(error: unknown): error is NodeJS.ErrnoException {
  return typeof error === "object" && error !== null && "code" in error;
}

export function toItemError(error: unknown, targetPath: string): DotplaceError {
  if (error instanceof DotplaceError) {
    return error;
  }
  const message = error instanceof Error ? error.message : String(error);
  if (isErrnoException(error)) {
    const errno = typeof error.code === "string" ? error.code : null;
    if (errno === "EACCES" || errno === "EPERM") {
      return new PermissionError(`Permission denied: ${targetPath} (${message})`, targetPath);
    }
    return new IOError(message, targetPath, errno);
  }
  return new IOError(message, targetPath);
}
