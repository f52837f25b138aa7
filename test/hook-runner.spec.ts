// test/hook-runner.spec.ts

import { describe, it, expect } from 'vitest';
import { HookRunner, matchesFilter } from '../src/core/hook-runner';
import type { RenderedEntry } from '../src/schema';

const text = (p: string, content: string): RenderedEntry => ({
    type: 'file',
    path: p,
    sourcePath: p,
    data: Buffer.from(content, 'utf8'),
});

describe('matchesFilter', () => {
    it('requires an include or files match when given', () => {
        expect(matchesFilter('src/a.ts', { include: ['src/**'] })).toBe(true);
        expect(matchesFilter('lib/a.ts', { include: ['src/**'] })).toBe(false);
        expect(matchesFilter('lib/a.ts', { include: ['src/**'], files: ['lib/a.ts'] })).toBe(true);
    });

    it('lets exclude win over include', () => {
        expect(matchesFilter('src/a.test.ts', { include: ['src/**'], exclude: ['**/*.test.ts'] })).toBe(false);
    });

    it('matches everything without patterns', () => {
        expect(matchesFilter('.github/ci.yml', {})).toBe(true);
    });
});

describe('HookRunner', () => {
    it('chains postRenderFile results in declaration order', async () => {
        const runner = new HookRunner({
            postRenderFile: [
                { include: ['**/*.md'], fn: (ctx) => ctx.content.toUpperCase() },
                { fn: (ctx) => `${ctx.content}!` },
                { exclude: ['**'], fn: () => 'never' },
            ],
        });

        const out = await runner.runPostRenderFile(
            [text('docs/readme.md', 'hi'), text('main.txt', 'x'), { type: 'dir', path: 'docs', sourcePath: 'docs' }],
            new Map(),
        );

        expect(out.map((e) => e.data?.toString('utf8'))).toEqual(['HI!', 'x!', undefined]);
    });

    it('keeps entries when hooks return nothing', async () => {
        const seen: string[] = [];
        const entry = text('a.txt', 'a');
        const runner = new HookRunner({
            postRenderFile: [{ fn: (ctx) => void seen.push(`${ctx.path}<-${ctx.sourcePath}`) }],
        });

        const [out] = await runner.runPostRenderFile([entry], new Map([['flag', true]]));

        expect(out).toBe(entry);
        expect(seen).toEqual(['a.txt<-a.txt']);
    });

    it('never hands verbatim files to hooks', async () => {
        const binary: RenderedEntry = { ...text('logo.png', 'raw'), verbatim: true };
        const runner = new HookRunner({ postRenderFile: [{ fn: () => 'changed' }] });

        const [out] = await runner.runPostRenderFile([binary], new Map());

        expect(out.data?.toString('utf8')).toBe('raw');
    });

    it('runs postGenerate hooks in order', async () => {
        const calls: string[] = [];
        const runner = new HookRunner({
            postGenerate: [
                async (ctx) => void calls.push(`first:${ctx.outDir}`),
                (ctx) => void calls.push(`second:${String(ctx.values.get('n'))}`),
            ],
        });

        await runner.runPostGenerate({ outDir: '/out', values: new Map([['n', 'v']]) });

        expect(calls).toEqual(['first:/out', 'second:v']);
    });
});
