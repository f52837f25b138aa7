// test/expression.spec.ts

import { describe, it, expect } from 'vitest';
import { parseExpression, referencedIdentifiers, identifierNodes } from '../src/ast';
import { RuleError } from '../src/core/errors';

function parseError(source: string): RuleError {
    try {
        parseExpression(source);
    } catch (err) {
        if (err instanceof RuleError) return err;
        throw err;
    }
    throw new Error(`expected "${source}" to fail`);
}

describe('parseExpression', () => {
    it('gives && precedence over ||, and ! over &&', () => {
        const expr = parseExpression('a && b || !c');

        expect(expr.type).toBe('logical');
        if (expr.type !== 'logical') return;
        expect(expr.op).toBe('or');
        expect(expr.left).toMatchObject({ type: 'logical', op: 'and' });
        expect(expr.right).toMatchObject({ type: 'not', operand: { type: 'ident', name: 'c' } });
    });

    it('accepts word operators', () => {
        const expr = parseExpression('not a and b or c');
        expect(expr).toMatchObject({
            type: 'logical',
            op: 'or',
            left: { type: 'logical', op: 'and', left: { type: 'not' } },
            right: { type: 'ident', name: 'c' },
        });
    });

    it('parses comparisons with quoted strings, numbers and booleans', () => {
        expect(parseExpression('license == "MIT"')).toMatchObject({
            type: 'compare',
            op: '==',
            left: { type: 'ident', name: 'license' },
            right: { type: 'literal', value: 'MIT' },
        });
        expect(parseExpression("name != 'x y'")).toMatchObject({
            op: '!=',
            right: { type: 'literal', value: 'x y' },
        });
        expect(parseExpression('count == 2')).toMatchObject({
            right: { type: 'literal', value: '2' },
        });
        expect(parseExpression('version == 1.2.0')).toMatchObject({
            right: { type: 'literal', value: '1.2.0' },
        });
        expect(parseExpression('bench == false')).toMatchObject({
            right: { type: 'literal', value: false },
        });
    });

    it('allows hyphens inside identifiers', () => {
        expect(parseExpression('project-name')).toEqual({ type: 'ident', name: 'project-name', offset: 0 });
    });

    it('honours parentheses', () => {
        const expr = parseExpression('a && (b || c)');
        expect(expr).toMatchObject({
            op: 'and',
            right: { type: 'logical', op: 'or' },
        });
    });
});

describe('parseExpression errors', () => {
    it('rejects an empty expression', () => {
        const err = parseError('   ');
        expect(err.code).toBe('MalformedExpression');
        expect(err.offset).toBe(0);
        expect(err.detail).toBe('Expected an expression');
    });

    it('rejects a single "="', () => {
        const err = parseError('a = b');
        expect(err.offset).toBe(2);
        expect(err.detail).toBe('Unknown operator "=" (use "==")');
    });

    it('rejects a single "&"', () => {
        const err = parseError('a & b');
        expect(err.offset).toBe(2);
        expect(err.detail).toBe('Unknown operator "&" (use "&&")');
    });

    it('reports an unclosed "(" at its position', () => {
        const err = parseError('(a && b');
        expect(err.offset).toBe(0);
        expect(err.detail).toBe('Unbalanced "(": missing ")"');
    });

    it('reports a stray ")"', () => {
        const err = parseError('a)');
        expect(err.offset).toBe(1);
        expect(err.detail).toBe('Unbalanced ")"');
    });

    it('reports an unterminated string at its opening quote', () => {
        const err = parseError("x == 'abc");
        expect(err.offset).toBe(5);
        expect(err.detail).toBe('Unterminated string literal');
    });

    it('rejects a number with a trailing dot', () => {
        const err = parseError('v == 1.2.');
        expect(err.offset).toBe(8);
        expect(err.detail).toBe('Unexpected character "."');
    });

    it('reports a dangling operator', () => {
        const err = parseError('a &&');
        expect(err.offset).toBe(4);
        expect(err.detail).toBe('Unexpected end of expression');
    });

    it('includes expression and offset in the message', () => {
        const err = parseError('a = b');
        expect(err.message).toBe('Unknown operator "=" (use "==") (at offset 2 of "a = b")');
    });
});

describe('identifier helpers', () => {
    it('lists referenced identifiers once, in source order', () => {
        expect(referencedIdentifiers(parseExpression('b && a || b'))).toEqual(['b', 'a']);
    });

    it('keeps identifier offsets', () => {
        const nodes = identifierNodes(parseExpression('bench && bogus'));
        expect(nodes.map((n) => [n.name, n.offset])).toEqual([
            ['bench', 0],
            ['bogus', 9],
        ]);
    });
});
