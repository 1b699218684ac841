export class ExportError extends Error {
    constructor(message: string, public originalError?: unknown) {
        super(message);
        this.name = 'ExportError';
    }
}

/** A data directory, index file or record file the run depends on is absent. */
export class MissingInputError extends ExportError {
    constructor(message: string) {
        super(message);
        this.name = 'MissingInputError';
    }
}

export class InvalidArgumentError extends ExportError {
    constructor(message: string) {
        super(message);
        this.name = 'InvalidArgumentError';
    }
}

export function isNotFoundError(error: unknown): boolean {
    if (!(error instanceof Error)) return false;
    const maybeErrno = error as NodeJS.ErrnoException;
    return maybeErrno.code === 'ENOENT' || maybeErrno.code === 'ENOTDIR';
}
