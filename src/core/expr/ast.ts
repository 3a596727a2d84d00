import type { Span } from '../../types/diagnostic.js';

export type BinaryOperator = '+' | '-' | '*' | '/' | '**' | '%' | '//';
export type UnaryOperator = '+' | '-';

export type Expr =
    | { kind: 'Number'; value: number; raw: string; range: Span }
    | { kind: 'Ident'; name: string; range: Span }
    | { kind: 'Unary'; op: UnaryOperator; expr: Expr; range: Span }
    | { kind: 'Binary'; op: BinaryOperator; left: Expr; right: Expr; range: Span }
    | { kind: 'Call'; callee: string; args: Expr[]; range: Span }
    | { kind: 'List'; elements: Expr[]; range: Span };

export type ExprKind = Expr['kind'];

export interface ExprError {
    message: string;
    range: Span;
}

export type ParseResult =
    | { ok: true; ast: Expr }
    | { ok: false; errors: ExprError[] };
