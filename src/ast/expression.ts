// src/ast/expression.ts

import {RuleError} from '../core/errors';
import type {OptionValue} from '../schema';

/**
 * Boolean condition AST.
 *
 * Grammar, lowest precedence first:
 *
 *   expr    := or
 *   or      := and ( ('||' | 'or') and )*
 *   and     := not ( ('&&' | 'and') not )*
 *   not     := ('!' | 'not') not | compare
 *   compare := primary ( ('==' | '!=') primary )?
 *   primary := '(' expr ')' | 'true' | 'false' | STRING | NUMBER | IDENT
 *   NUMBER  := [0-9]+ ( '.' [0-9]+ )*
 *
 * Numbers are kept as string literals ("2" == 2, "1.2.0" == 1.2.0).
 */
export type Expr =
    | LiteralExpr
    | IdentExpr
    | NotExpr
    | LogicalExpr
    | CompareExpr;

export interface LiteralExpr {
    type: 'literal';
    value: OptionValue;
    offset: number;
}

export interface IdentExpr {
    type: 'ident';
    name: string;
    offset: number;
}

export interface NotExpr {
    type: 'not';
    operand: Expr;
    offset: number;
}

export interface LogicalExpr {
    type: 'logical';
    op: 'and' | 'or';
    left: Expr;
    right: Expr;
    offset: number;
}

export interface CompareExpr {
    type: 'compare';
    op: '==' | '!=';
    left: Expr;
    right: Expr;
    offset: number;
}

/**
 * Option names and identifiers share this syntax. Hyphens are allowed
 * ("build_c_libs-with-pgo") since the grammar has no arithmetic.
 */
export const IDENTIFIER_PATTERN = /^[A-Za-z_][A-Za-z0-9_-]*$/;

type TokenKind =
    | 'lparen'
    | 'rparen'
    | 'and'
    | 'or'
    | 'not'
    | 'eq'
    | 'neq'
    | 'string'
    | 'ident'
    | 'true'
    | 'false'
    | 'eof';

interface Token {
    kind: TokenKind;
    value: string;
    offset: number;
}

const KEYWORDS = new Map<string, TokenKind>([
    ['and', 'and'],
    ['or', 'or'],
    ['not', 'not'],
    ['true', 'true'],
    ['false', 'false'],
]);

/**
 * Parse a condition expression.
 *
 * Throws RuleError (MalformedExpression) with the offending offset.
 */
export function parseExpression(source: string): Expr {
    const tokens = tokenize(source);
    const parser = new ExpressionParser(source, tokens);
    return parser.parse();
}

/**
 * Identifier nodes in source order (duplicates included).
 */
export function identifierNodes(expr: Expr): IdentExpr[] {
    const out: IdentExpr[] = [];

    const visit = (node: Expr): void => {
        switch (node.type) {
            case 'ident':
                out.push(node);
                break;
            case 'not':
                visit(node.operand);
                break;
            case 'logical':
            case 'compare':
                visit(node.left);
                visit(node.right);
                break;
            case 'literal':
                break;
        }
    };

    visit(expr);
    return out.sort((a, b) => a.offset - b.offset);
}

/**
 * Identifiers referenced anywhere in the expression, in source order.
 */
export function referencedIdentifiers(expr: Expr): string[] {
    return [...new Set(identifierNodes(expr).map((node) => node.name))];
}

// ---------------------------------------------------------------------------
// Internal: tokenizer
// ---------------------------------------------------------------------------

function malformed(source: string, offset: number, detail: string): RuleError {
    return new RuleError({
        code: 'MalformedExpression',
        detail,
        expression: source,
        offset,
    });
}

function tokenize(source: string): Token[] {
    const tokens: Token[] = [];
    const len = source.length;
    let i = 0;

    while (i < len) {
        const ch = source[i];
        const next = i + 1 < len ? source[i + 1] : '';

        if (/\s/.test(ch)) {
            i += 1;
            continue;
        }

        if (ch === '(') {
            tokens.push({kind: 'lparen', value: ch, offset: i});
            i += 1;
            continue;
        }
        if (ch === ')') {
            tokens.push({kind: 'rparen', value: ch, offset: i});
            i += 1;
            continue;
        }

        if (ch === '&' || ch === '|') {
            if (next !== ch) {
                throw malformed(source, i, `Unknown operator "${ch}" (use "${ch}${ch}")`);
            }
            tokens.push({kind: ch === '&' ? 'and' : 'or', value: ch + ch, offset: i});
            i += 2;
            continue;
        }

        if (ch === '=') {
            if (next !== '=') {
                throw malformed(source, i, 'Unknown operator "=" (use "==")');
            }
            tokens.push({kind: 'eq', value: '==', offset: i});
            i += 2;
            continue;
        }

        if (ch === '!') {
            if (next === '=') {
                tokens.push({kind: 'neq', value: '!=', offset: i});
                i += 2;
            } else {
                tokens.push({kind: 'not', value: '!', offset: i});
                i += 1;
            }
            continue;
        }

        if (ch === '"' || ch === "'") {
            const start = i;
            let value = '';
            i += 1;
            let closed = false;
            while (i < len) {
                const c = source[i];
                if (c === '\\' && i + 1 < len) {
                    value += source[i + 1];
                    i += 2;
                    continue;
                }
                if (c === ch) {
                    closed = true;
                    i += 1;
                    break;
                }
                value += c;
                i += 1;
            }
            if (!closed) {
                throw malformed(source, start, 'Unterminated string literal');
            }
            tokens.push({kind: 'string', value, offset: start});
            continue;
        }

        if (/[0-9]/.test(ch)) {
            const m = /^[0-9]+(\.[0-9]+)*/.exec(source.slice(i));
            const text = m ? m[0] : ch;
            tokens.push({kind: 'string', value: text, offset: i});
            i += text.length;
            continue;
        }

        if (/[A-Za-z_]/.test(ch)) {
            const m = /^[A-Za-z_][A-Za-z0-9_-]*/.exec(source.slice(i));
            const word = m ? m[0] : ch;
            const keyword = KEYWORDS.get(word);
            tokens.push({kind: keyword ?? 'ident', value: word, offset: i});
            i += word.length;
            continue;
        }

        throw malformed(source, i, `Unexpected character "${ch}"`);
    }

    tokens.push({kind: 'eof', value: '', offset: len});
    return tokens;
}

// ---------------------------------------------------------------------------
// Internal: recursive descent
// ---------------------------------------------------------------------------

class ExpressionParser {
    private pos = 0;

    constructor(
        private readonly source: string,
        private readonly tokens: Token[],
    ) {}

    parse(): Expr {
        if (this.peek().kind === 'eof') {
            throw malformed(this.source, 0, 'Expected an expression');
        }
        const expr = this.parseOr();
        const rest = this.peek();
        if (rest.kind !== 'eof') {
            const detail =
                rest.kind === 'rparen'
                    ? 'Unbalanced ")"'
                    : `Unexpected "${rest.value}" after end of expression`;
            throw malformed(this.source, rest.offset, detail);
        }
        return expr;
    }

    private peek(): Token {
        return this.tokens[Math.min(this.pos, this.tokens.length - 1)];
    }

    private advance(): Token {
        const tok = this.peek();
        if (tok.kind !== 'eof') this.pos += 1;
        return tok;
    }

    private parseOr(): Expr {
        let left = this.parseAnd();
        while (this.peek().kind === 'or') {
            const op = this.advance();
            const right = this.parseAnd();
            left = {type: 'logical', op: 'or', left, right, offset: op.offset};
        }
        return left;
    }

    private parseAnd(): Expr {
        let left = this.parseNot();
        while (this.peek().kind === 'and') {
            const op = this.advance();
            const right = this.parseNot();
            left = {type: 'logical', op: 'and', left, right, offset: op.offset};
        }
        return left;
    }

    private parseNot(): Expr {
        const tok = this.peek();
        if (tok.kind === 'not') {
            this.advance();
            return {type: 'not', operand: this.parseNot(), offset: tok.offset};
        }
        return this.parseCompare();
    }

    private parseCompare(): Expr {
        const left = this.parsePrimary();
        const tok = this.peek();
        if (tok.kind === 'eq' || tok.kind === 'neq') {
            this.advance();
            const right = this.parsePrimary();
            return {
                type: 'compare',
                op: tok.kind === 'eq' ? '==' : '!=',
                left,
                right,
                offset: tok.offset,
            };
        }
        return left;
    }

    private parsePrimary(): Expr {
        const tok = this.advance();
        switch (tok.kind) {
            case 'lparen': {
                const inner = this.parseOr();
                const close = this.peek();
                if (close.kind !== 'rparen') {
                    throw malformed(this.source, tok.offset, 'Unbalanced "(": missing ")"');
                }
                this.advance();
                return inner;
            }
            case 'true':
                return {type: 'literal', value: true, offset: tok.offset};
            case 'false':
                return {type: 'literal', value: false, offset: tok.offset};
            case 'string':
                return {type: 'literal', value: tok.value, offset: tok.offset};
            case 'ident':
                return {type: 'ident', name: tok.value, offset: tok.offset};
            case 'eof':
                throw malformed(this.source, tok.offset, 'Unexpected end of expression');
            default:
                throw malformed(this.source, tok.offset, `Unexpected "${tok.value}"`);
        }
    }
}
