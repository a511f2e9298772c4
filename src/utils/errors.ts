export type TelescopeErrorCode =
    | "CONNECTION_FAILURE"
    | "QUERY_FAILURE"
    | "INVALID_ARGUMENT"
    | "NOT_FOUND"
    | "CONFIGURATION_ERROR";

export class TelescopeError extends Error {
    constructor(
        readonly code: TelescopeErrorCode,
        message: string,
        options?: { cause?: unknown }
    ) {
        super(message, options);
        this.name = new.target.name;
    }
}

/** Storage cannot be reached. */
export class ConnectionFailure extends TelescopeError {
    constructor(message: string, options?: { cause?: unknown }) {
        super("CONNECTION_FAILURE", message, options);
    }
}

/** Storage rejected a statement. */
export class QueryFailure extends TelescopeError {
    constructor(message: string, options?: { cause?: unknown }) {
        super("QUERY_FAILURE", message, options);
    }
}

export class InvalidArgument extends TelescopeError {
    constructor(message: string) {
        super("INVALID_ARGUMENT", message);
    }
}

export class NotFound extends TelescopeError {
    constructor(message: string) {
        super("NOT_FOUND", message);
    }
}

export class ConfigurationError extends TelescopeError {
    constructor(message: string) {
        super("CONFIGURATION_ERROR", message);
    }
}

export function errorMessage(error: unknown): string {
    if (error instanceof Error) {
        return error.message;
    }
    return String(error);
}
