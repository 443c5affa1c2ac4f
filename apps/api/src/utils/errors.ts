export class AIServiceError extends Error {
    public code: string;
    public statusCode?: number;
    public details?: string;

    constructor(message: string, code: string, statusCode?: number, details?: string) {
        super(message);
        this.name = 'AIServiceError';
        this.code = code;
        this.statusCode = statusCode;
        this.details = details;
    }
}

export class ParseError extends Error {
    public details?: string;
    constructor(message: string, details?: string) {
        super(message);
        this.name = 'ParseError';
        this.details = details;
    }
}

export class ValidationError extends Error {
    public details?: string[];
    constructor(message: string, details?: string[] | string) {
        super(message);
        this.name = 'ValidationError';
        if (Array.isArray(details)) {
            this.details = details;
        } else if (details) {
            this.details = [details];
        }
    }
}

export class TimeoutError extends Error {
    public timeoutMs: number;
    constructor(message: string, timeoutMs: number) {
        super(message);
        this.name = 'TimeoutError';
        this.timeoutMs = timeoutMs;
    }
}

export class QuestionCountError extends Error {
    public expected: number;
    public received: number;
    constructor(message: string, expected: number, received: number) {
        super(message);
        this.name = 'QuestionCountError';
        this.expected = expected;
        this.received = received;
    }
}

export class CacheError extends Error {
    public operation: 'get' | 'set';
    constructor(message: string, operation: 'get' | 'set') {
        super(message);
        this.name = 'CacheError';
        this.operation = operation;
    }
}

export function errorMessage(error: unknown): string {
    return error instanceof Error ? error.message : 'Unknown error';
}

/** Extra context carried by the AI and parsing errors, for logs only. */
export function errorDetails(error: unknown): { code?: string; details?: string | string[] } {
    if (error instanceof AIServiceError) {
        return { code: error.code, details: error.details };
    }
    if (error instanceof ParseError || error instanceof ValidationError) {
        return { details: error.details };
    }
    return {};
}
