//
// Gets a printable message from anything that was thrown.
//
export function errorMessage(error: unknown): string {
    if (error instanceof Error) {
        return error.message;
    }
    return String(error);
}

//
// An error raised while doing something on behalf of the caller,
// carrying the lower level failure that caused it.
//
export class WrappedError extends Error {
    constructor(message: string, public readonly options: { cause: unknown }) {
        super(message);
        this.name = "WrappedError";
    }

    //
    // The message of this error followed by the messages of the errors it wraps.
    //
    fullMessage(): string {
        const cause = this.options.cause;
        if (cause instanceof WrappedError) {
            return `${this.message}: ${cause.fullMessage()}`;
        }
        return `${this.message}: ${errorMessage(cause)}`;
    }
}

//
// A problem the user can fix, reported by the CLI without a stack trace.
//
export class FatalError extends Error {
    constructor(message: string) {
        super(message);
        this.name = "FatalError";
    }
}
