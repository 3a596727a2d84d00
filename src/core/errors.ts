import type { ErrorKind, EvalError, Span } from '../types/diagnostic.js';

export class ExpressionError extends Error {
    constructor(public kind: ErrorKind, message: string, public span?: Span) {
        super(message);
        this.name = 'ExpressionError';
    }

    toEvalError(): EvalError {
        return this.span
            ? { kind: this.kind, message: this.message, span: this.span }
            : { kind: this.kind, message: this.message };
    }
}
