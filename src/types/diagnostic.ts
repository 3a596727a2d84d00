export type Severity = 'error' | 'warning';

export type ErrorKind =
    | 'ParseError'
    | 'UnsupportedExpression'
    | 'UnknownName'
    | 'UnknownFunction'
    | 'NotCallable'
    | 'ArityMismatch'
    | 'DivisionByZero'
    | 'DomainError'
    | 'TypeMismatch'
    | 'Timeout';

/** Character offsets into the normalized expression text. */
export type Span = { start: number; end: number };

export interface EvalError {
    kind: ErrorKind;
    message: string;
    span?: Span;
}

export type EvalResult =
    | { ok: true; value: number; expression: string; normalized: string }
    | { ok: false; error: EvalError; expression: string; normalized: string };

export interface Location {
    line: number;
    col: number;
    offset: number;
}

export interface Range {
    start: Location;
    end: Location;
}

/** A problem found while loading configuration, located in the config file. */
export interface Diagnostic {
    code: string;
    message: string;
    severity: Severity;
    file: string;
    range?: Range;
    path?: string[]; // Path within the config object (e.g. ['profiles', 'ci', 'precision'])
}
