// test/init-template.spec.ts

import fs from 'fs';
import os from 'os';
import path from 'path';
import { afterEach, beforeEach, describe, it, expect } from 'vitest';
import { initTemplate } from '../src/core/init-template';
import { generate } from '../src/core/runner';
import { IoError } from '../src/core/errors';
import { Logger } from '../src/util/logger';

describe('initTemplate', () => {
    let work: string;
    let template: string;

    beforeEach(() => {
        work = fs.mkdtempSync(path.join(os.tmpdir(), 'tforge-init-'));
        template = path.join(work, 'starter');
    });

    afterEach(() => {
        fs.rmSync(work, { recursive: true, force: true });
    });

    it('writes the starter files', async () => {
        const result = await initTemplate(template);

        expect(result.templateDir).toBe(template);
        expect(result.written.map((f) => path.relative(template, f).split(path.sep).join('/'))).toEqual([
            'template.toml',
            'README.md.liquid',
            'src/{{project-name}}/index.txt',
            'docs/index.md',
        ]);
    });

    it('refuses to overwrite unless forced', async () => {
        await initTemplate(template);
        fs.writeFileSync(path.join(template, 'README.md.liquid'), 'edited');

        await expect(initTemplate(template)).rejects.toBeInstanceOf(IoError);
        expect(fs.readFileSync(path.join(template, 'README.md.liquid'), 'utf8')).toBe('edited');

        await initTemplate(template, { force: true });
        expect(fs.readFileSync(path.join(template, 'README.md.liquid'), 'utf8')).not.toBe('edited');
    });

    it('generates a project from the defaults', async () => {
        await initTemplate(template);
        const out = path.join(work, 'out');

        const result = await generate({ templateDir: template, outDir: out, logger: new Logger({ level: 'silent' }) });

        expect(result.excluded).toEqual(['docs']);
        expect(fs.readFileSync(path.join(out, 'README.md'), 'utf8')).toBe(
            '# My Project\n\nPackage: `my_project`, licensed under MIT.\n',
        );
        expect(fs.readFileSync(path.join(out, 'src/my-project/index.txt'), 'utf8')).toBe('my-project starts here.\n');
        expect(fs.existsSync(path.join(out, 'docs'))).toBe(false);
    });

    it('renders the docs section when enabled', async () => {
        await initTemplate(template);
        const out = path.join(work, 'out');

        await generate({
            templateDir: template,
            outDir: out,
            defines: { docs: 'true', 'docs-title': 'Guide' },
            logger: new Logger({ level: 'silent' }),
        });

        expect(fs.readFileSync(path.join(out, 'README.md'), 'utf8')).toBe(
            '# My Project\n\nPackage: `my_project`, licensed under MIT.\nSee the Guide in `docs/`.\n',
        );
        expect(fs.readFileSync(path.join(out, 'docs/index.md'), 'utf8')).toBe('# Guide\n');
    });
});
