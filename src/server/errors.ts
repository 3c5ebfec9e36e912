export class AppError extends Error {
    status: number;
    code?: string;

    constructor(message: string, status = 500, code?: string) {
        super(message);
        this.name = 'AppError';
        this.status = status;
        if (code !== undefined) this.code = code;
    }
}

export function isAppError(e: unknown): e is AppError {
    return e instanceof AppError;
}

// Shape of the JSON error body and log entry every route sends.
export function describeError(e: unknown) {
    if (isAppError(e)) {
        return { status: e.status, message: e.message, code: e.code };
    }
    return {
        status: 500,
        message: e instanceof Error ? e.message : String(e),
        code: undefined,
    };
}
