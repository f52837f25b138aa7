// test/matrix.spec.ts

import fs from 'fs';
import os from 'os';
import path from 'path';
import { afterEach, beforeEach, describe, it, expect } from 'vitest';
import { generateMatrix, isSafeEntryName, loadMatrixFile } from '../src/core/matrix';
import { ManifestError } from '../src/core/errors';
import { Logger } from '../src/util/logger';

const logger = new Logger({ level: 'silent' });

describe('matrix', () => {
    let work: string;
    let template: string;

    beforeEach(() => {
        work = fs.mkdtempSync(path.join(os.tmpdir(), 'tforge-matrix-'));
        template = path.join(work, 'template');
        fs.mkdirSync(template);
        fs.writeFileSync(
            path.join(template, 'template.toml'),
            '[placeholders.name]\ntype = "string"\n\n[placeholders.docs]\ntype = "bool"\ndefault = false\n',
        );
        fs.writeFileSync(path.join(template, 'out.txt'), '{{ name }}{% if docs %}+docs{% endif %}');
    });

    afterEach(() => {
        fs.rmSync(work, { recursive: true, force: true });
    });

    it('generates each entry into its own directory and reports failures', async () => {
        const outRoot = path.join(work, 'matrix');
        const outcomes = await generateMatrix({
            templateDir: template,
            outRoot,
            matrix: {
                plain: { name: 'a' },
                documented: { name: 'b', docs: true },
                broken: {},
                '../escape': { name: 'c' },
            },
            logger,
        });

        expect(outcomes.map((o) => [o.name, o.ok])).toEqual([
            ['plain', true],
            ['documented', true],
            ['broken', false],
            ['../escape', false],
        ]);
        expect(fs.readFileSync(path.join(outRoot, 'plain/out.txt'), 'utf8')).toBe('a');
        expect(fs.readFileSync(path.join(outRoot, 'documented/out.txt'), 'utf8')).toBe('b+docs');
        expect(fs.readdirSync(outRoot).sort()).toEqual(['documented', 'plain']);
        expect(fs.existsSync(path.join(work, 'escape'))).toBe(false);
    });

    it('reads a TOML matrix file', () => {
        const file = path.join(work, 'matrix.toml');
        fs.writeFileSync(file, '[small]\nname = "s"\ndocs = false\n\n[big]\nname = "b"\nport = 8080\n');

        expect(loadMatrixFile(file)).toEqual({
            small: { name: 's', docs: false },
            big: { name: 'b', port: '8080' },
        });
    });

    it('rejects values that are not tables of scalars', () => {
        const file = path.join(work, 'matrix.toml');
        fs.writeFileSync(file, '[entry]\nlist = ["a"]\n');
        expect(() => loadMatrixFile(file)).toThrow(ManifestError);
    });

    it('only accepts single, safe path segments as entry names', () => {
        expect(isSafeEntryName('release-1.0')).toBe(true);
        expect(isSafeEntryName('..')).toBe(false);
        expect(isSafeEntryName('a/b')).toBe(false);
        expect(isSafeEntryName('.hidden')).toBe(false);
    });
});
