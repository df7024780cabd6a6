export function isErrnoException(err: unknown): err is NodeJS.ErrnoException {
    return err instanceof Error && 'code' in err;
}

/** `ENOENT`, or `ENOTDIR` when a path component is no longer a directory. */
export function isNotFoundError(err: unknown): boolean {
    return isErrnoException(err) && (err.code === 'ENOENT' || err.code === 'ENOTDIR');
}

export function isPermissionError(err: unknown): boolean {
    return isErrnoException(err) && (err.code === 'EACCES' || err.code === 'EPERM');
}

export function describeError(err: unknown): string {
    return err instanceof Error ? err.message : String(err);
}
