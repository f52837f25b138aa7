// test/check-template.spec.ts

import fs from 'fs';
import os from 'os';
import path from 'path';
import { afterEach, beforeEach, describe, it, expect } from 'vitest';
import { checkTemplate } from '../src/core/check-template';
import { initTemplate } from '../src/core/init-template';

function writeFiles(root: string, files: Record<string, string>): void {
    for (const [rel, content] of Object.entries(files)) {
        const abs = path.join(root, rel);
        fs.mkdirSync(path.dirname(abs), { recursive: true });
        fs.writeFileSync(abs, content);
    }
}

const MANIFEST = `
[placeholders.name]
type = "string"
default = "x"

[placeholders.flag]
type = "bool"
default = true
`;

describe('checkTemplate', () => {
    let dir: string;

    beforeEach(() => {
        dir = fs.mkdtempSync(path.join(os.tmpdir(), 'tforge-check-'));
    });

    afterEach(() => {
        fs.rmSync(dir, { recursive: true, force: true });
    });

    it('reports no problems for the starter template', async () => {
        await initTemplate(dir);
        expect(await checkTemplate(dir)).toEqual([]);
    });

    it('reports problems with their locations', async () => {
        writeFiles(dir, {
            'template.toml': MANIFEST,
            'a.txt': 'ok {{ name }}\n{{ ghost }}',
            'b.txt': '{{ name | shout }}',
            'c.txt': 'x\n{% if flag && ghost %}y{% endif %}',
            'd.txt': 'line\n  {% bogus %}',
        });

        const diagnostics = await checkTemplate(dir);

        expect(diagnostics.map((d) => [d.code, d.file, d.line, d.column, d.severity])).toEqual([
            ['unknown-placeholder', 'a.txt', 2, 1, 'warning'],
            ['unknown-filter', 'b.txt', 1, 1, 'warning'],
            ['unknown-identifier', 'c.txt', 2, 15, 'warning'],
            ['syntax-error', 'd.txt', 2, 3, 'error'],
        ]);
        expect(diagnostics[0].message).toBe('"ghost" is not a declared option or derived placeholder');
        expect(diagnostics[1].message).toBe('Unknown filter "shout" in "name | shout"');
        expect(diagnostics[2].message).toBe(
            'Condition "flag && ghost" names undeclared option "ghost" (always absent)',
        );
    });

    it('checks path segments and files inside excluded directories', async () => {
        writeFiles(dir, {
            'template.toml': `${MANIFEST}\n[conditional.'flag == true']\nignore = ["extra"]\n`,
            'extra/{{ dir_name }}/keep.txt': '{{ name }}',
        });

        const diagnostics = await checkTemplate(dir);

        expect(diagnostics).toHaveLength(1);
        expect(diagnostics[0]).toMatchObject({ code: 'unknown-placeholder', file: 'extra/{{ dir_name }}' });
    });

    it('skips files that are not valid UTF-8', async () => {
        writeFiles(dir, { 'template.toml': MANIFEST });
        fs.writeFileSync(path.join(dir, 'legacy.txt'), Buffer.concat([Buffer.from('{{ ghost }} caf'), Buffer.from([0xe9])]));

        expect(await checkTemplate(dir)).toEqual([]);
    });

    it('reports schema errors and skips name checks', async () => {
        writeFiles(dir, {
            'template.toml': '[placeholders.slug]\ntype = "string"\nregex = "("\n',
            'a.txt': '{{ anything }}',
        });

        const diagnostics = await checkTemplate(dir);

        expect(diagnostics.map((d) => d.code)).toEqual(['schema-error']);
    });

    it('reports a manifest that does not parse', async () => {
        writeFiles(dir, { 'template.toml': '[placeholders\n' });

        const diagnostics = await checkTemplate(dir);

        expect(diagnostics).toHaveLength(1);
        expect(diagnostics[0].code).toBe('manifest-error');
        expect(diagnostics[0].file).toBeUndefined();
    });
});
