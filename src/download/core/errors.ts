export type TrimErrorCode =
    | 'validation'
    | 'remote'
    | 'timeout'
    | 'artifact'
    | 'not_found'
    | 'not_ready';

const HTTP_STATUS: Record<TrimErrorCode, number> = {
    validation: 400,
    remote: 502,
    timeout: 408,
    artifact: 500,
    not_found: 404,
    not_ready: 400,
};

/**
 * Error raised across the pipeline boundary. The code decides how the
 * HTTP layer reports it.
 */
export class TrimError extends Error {
    readonly code: TrimErrorCode;

    constructor(code: TrimErrorCode, message: string) {
        super(message);
        this.name = 'TrimError';
        this.code = code;
    }

    get httpStatus(): number {
        return HTTP_STATUS[this.code];
    }
}

export function isTrimError(error: unknown): error is TrimError {
    return error instanceof TrimError;
}

export function errorMessage(error: unknown): string {
    return error instanceof Error ? error.message : String(error);
}
