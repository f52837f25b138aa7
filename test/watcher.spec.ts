// test/watcher.spec.ts

import fs from 'fs';
import os from 'os';
import path from 'path';
import { afterEach, beforeEach, describe, it, expect, vi } from 'vitest';
import { watchTemplate, type TemplateWatcher } from '../src/core/watcher';
import { Logger } from '../src/util/logger';

/** Records what the watcher itself logs; children stay silent. */
class RecordingLogger extends Logger {
    readonly infos: string[] = [];
    readonly errors: string[] = [];

    constructor() {
        super({ level: 'silent' });
    }

    info(msg: unknown): void {
        this.infos.push(String(msg));
    }

    error(msg: unknown): void {
        this.errors.push(String(msg));
    }

    runs(): number {
        return this.infos.filter((m) => m.startsWith('Change detected')).length;
    }
}

const sleep = (ms: number) => new Promise((resolve) => setTimeout(resolve, ms));

describe('watchTemplate', () => {
    let template: string;
    let out: string;
    let watcher: TemplateWatcher | undefined;

    beforeEach(() => {
        template = fs.mkdtempSync(path.join(os.tmpdir(), 'tforge-watch-'));
        out = path.join(template, 'out');
        fs.writeFileSync(path.join(template, 'template.toml'), '[placeholders.name]\ntype = "string"\ndefault = "a"\n');
        fs.writeFileSync(path.join(template, 'greeting.txt'), 'hi {{ name }}');
    });

    afterEach(async () => {
        await watcher?.close();
        watcher = undefined;
        fs.rmSync(template, { recursive: true, force: true });
    });

    const readOutput = () => fs.readFileSync(path.join(out, 'greeting.txt'), 'utf8');

    it('regenerates once per edit and ignores its own output', async () => {
        const logger = new RecordingLogger();
        watcher = watchTemplate({ templateDir: template, outDir: out, debounceMs: 100, logger });

        await vi.waitFor(() => expect(readOutput()).toBe('hi a'), { timeout: 5000, interval: 50 });
        // Writing out/ (inside the template) must not schedule another run.
        await sleep(500);
        expect(logger.runs()).toBe(1);

        fs.writeFileSync(path.join(template, 'greeting.txt'), 'hello {{ name }}');

        await vi.waitFor(() => expect(readOutput()).toBe('hello a'), { timeout: 5000, interval: 50 });
        await sleep(500);
        expect(logger.runs()).toBe(2);
        expect(fs.readdirSync(template).sort()).toEqual(['greeting.txt', 'out', 'template.toml']);
    }, 15_000);

    it('logs a failed run and keeps watching', async () => {
        const logger = new RecordingLogger();
        watcher = watchTemplate({ templateDir: template, outDir: out, debounceMs: 100, logger });
        await vi.waitFor(() => expect(readOutput()).toBe('hi a'), { timeout: 5000, interval: 50 });
        await sleep(300);

        fs.writeFileSync(path.join(template, 'greeting.txt'), 'hi {{ missing }}');
        await vi.waitFor(() => expect(logger.errors).toEqual(['Generation failed:']), { timeout: 5000, interval: 50 });
        expect(readOutput()).toBe('hi a');

        fs.writeFileSync(path.join(template, 'greeting.txt'), 'bye {{ name }}');
        await vi.waitFor(() => expect(readOutput()).toBe('bye a'), { timeout: 5000, interval: 50 });
    }, 15_000);
});
