// test/rule-engine.spec.ts

import { describe, it, expect } from 'vitest';
import fc from 'fast-check';
import {
    compileExpression,
    compileRules,
    computeExclusions,
    evaluateSource,
    isPathExcluded,
    normalizePattern,
} from '../src/core/rule-engine';
import { RuleError } from '../src/core/errors';
import type { OptionValue } from '../src/schema';

const config = (entries: Record<string, OptionValue>) => new Map(Object.entries(entries));

describe('evaluate (absent-is-false)', () => {
    const empty = config({});

    it('treats a bare absent option as false', () => {
        expect(evaluateSource('missing', empty)).toBe(false);
        expect(evaluateSource('!missing', empty)).toBe(true);
    });

    it('makes every comparison with an absent option false', () => {
        expect(evaluateSource('missing == false', empty)).toBe(false);
        expect(evaluateSource('missing != true', empty)).toBe(false);
        expect(evaluateSource('missing == missing', empty)).toBe(false);
        expect(evaluateSource('"x" != missing', empty)).toBe(false);
    });

    it('negates a false comparison', () => {
        expect(evaluateSource('!(missing == true)', empty)).toBe(true);
    });

    it('never equates values of different types', () => {
        const values = config({ flag: true });
        expect(evaluateSource('flag == "true"', values)).toBe(false);
        expect(evaluateSource('flag != "true"', values)).toBe(true);
        expect(evaluateSource('flag == true', values)).toBe(true);
    });

    it('compares strings', () => {
        const values = config({ license: 'MIT', count: '2' });
        expect(evaluateSource('license == "MIT"', values)).toBe(true);
        expect(evaluateSource("license != 'MIT'", values)).toBe(false);
        expect(evaluateSource('count == 2', values)).toBe(true);
    });

    it('treats strings as true when non-empty', () => {
        expect(evaluateSource('name', config({ name: 'demo' }))).toBe(true);
        expect(evaluateSource('name', config({ name: '' }))).toBe(false);
    });

    it('applies operator precedence', () => {
        expect(evaluateSource('true || false && false', empty)).toBe(true);
        expect(evaluateSource('(true || false) && false', empty)).toBe(false);
    });

    it('negation always inverts the result', () => {
        const names = ['a', 'b'];
        fc.assert(
            fc.property(
                fc.record({ a: fc.option(fc.boolean(), { nil: undefined }), b: fc.option(fc.boolean(), { nil: undefined }) }),
                fc.constantFrom('a', 'a && b', 'a || !b', 'a == true', 'b != false', 'a == b'),
                (raw, source) => {
                    const values = new Map<string, OptionValue>();
                    for (const name of names) {
                        const v = name === 'a' ? raw.a : raw.b;
                        if (v !== undefined) values.set(name, v);
                    }
                    expect(evaluateSource(`!(${source})`, values)).toBe(!evaluateSource(source, values));
                },
            ),
        );
    });
});

describe('compileExpression', () => {
    it('rejects identifiers that are not declared options', () => {
        let caught: unknown;
        try {
            compileExpression('bench && bogus', new Set(['bench']), 'exclusion rule #1');
        } catch (err) {
            caught = err;
        }
        expect(caught).toBeInstanceOf(RuleError);
        if (!(caught instanceof RuleError)) return;
        expect(caught.code).toBe('UnknownOption');
        expect(caught.offset).toBe(9);
        expect(caught.message).toBe(
            'Unknown option "bogus" in exclusion rule #1 (at offset 9 of "bench && bogus")',
        );
    });

    it('attributes parse errors to their origin', () => {
        expect(() => compileExpression('a =', new Set(['a']), 'option "b"')).toThrow(
            'Unknown operator "=" (use "==") in option "b" (at offset 2 of "a =")',
        );
    });
});

describe('exclusions', () => {
    const rules = compileRules(
        [
            { when: 'bench == false', paths: ['benches/', './bench.toml'] },
            { when: 'true', paths: ['assets/**/*.psd'] },
        ],
        new Set(['bench']),
    );

    it('collects the paths of every rule that holds', () => {
        expect([...computeExclusions(rules, config({ bench: false }))].sort()).toEqual([
            'assets/**/*.psd',
            'bench.toml',
            'benches',
        ]);
        expect([...computeExclusions(rules, config({ bench: true }))]).toEqual(['assets/**/*.psd']);
    });

    it('excludes a path when it or an ancestor matches', () => {
        const set = new Set(['benches']);
        expect(isPathExcluded('benches', set)).toBe(true);
        expect(isPathExcluded('benches/main.rs', set)).toBe(true);
        expect(isPathExcluded('benches2/main.rs', set)).toBe(false);
        expect(isPathExcluded('src/benches', set)).toBe(false);
    });

    it('matches glob patterns against the path and its ancestors', () => {
        expect(isPathExcluded('logo.png', new Set(['**/*.png']))).toBe(true);
        expect(isPathExcluded('assets/img/logo.png', new Set(['**/*.png']))).toBe(true);
        expect(isPathExcluded('docs/api/index.md', new Set(['docs/*']))).toBe(true);
        expect(isPathExcluded('docs.md', new Set(['docs/*']))).toBe(false);
    });

    it('treats placeholder segments literally', () => {
        const set = new Set(['src/{{project-name}}']);
        expect(isPathExcluded('src/{{project-name}}/index.txt', set)).toBe(true);
        expect(isPathExcluded('src/other/index.txt', set)).toBe(false);
    });

    it('normalises patterns', () => {
        expect(normalizePattern('./docs/')).toBe('docs');
        expect(normalizePattern('docs\\api')).toBe('docs/api');
    });

    it('never un-excludes a path excluded by an enabled rule', () => {
        const nested = compileRules(
            [
                { when: 'a', paths: ['x'] },
                { when: 'a && b', paths: ['x/y'] },
                { when: '!a', paths: ['z'] },
            ],
            new Set(['a', 'b']),
        );
        fc.assert(
            fc.property(fc.boolean(), fc.boolean(), (a, b) => {
                const excluded = computeExclusions(nested, config({ a, b }));
                expect(isPathExcluded('x/y/file.txt', excluded)).toBe(a);
                expect(isPathExcluded('x/other.txt', excluded)).toBe(a);
                expect(isPathExcluded('z/q.txt', excluded)).toBe(!a);
            }),
        );
    });
});
