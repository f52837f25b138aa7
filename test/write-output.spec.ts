// test/write-output.spec.ts

import fs from 'fs';
import os from 'os';
import path from 'path';
import { afterEach, beforeEach, describe, it, expect } from 'vitest';
import { writeRenderedTree } from '../src/core/write-output';
import { IoError } from '../src/core/errors';
import { Logger } from '../src/util/logger';
import type { RenderedEntry } from '../src/schema';

const logger = new Logger({ level: 'silent' });

const file = (p: string, text: string): RenderedEntry => ({
    type: 'file',
    path: p,
    sourcePath: p,
    data: Buffer.from(text, 'utf8'),
});

describe('writeRenderedTree', () => {
    let root: string;

    beforeEach(() => {
        root = fs.mkdtempSync(path.join(os.tmpdir(), 'tforge-write-'));
    });

    afterEach(() => {
        fs.rmSync(root, { recursive: true, force: true });
    });

    it('writes every entry and leaves no temporary directory', () => {
        const out = path.join(root, 'out');
        const written = writeRenderedTree(
            out,
            [
                { type: 'dir', path: 'empty', sourcePath: 'empty' },
                { type: 'dir', path: 'src', sourcePath: 'src' },
                file('src/main.txt', 'hello'),
            ],
            { logger },
        );

        expect(written).toBe(out);
        expect(fs.readFileSync(path.join(out, 'src/main.txt'), 'utf8')).toBe('hello');
        expect(fs.statSync(path.join(out, 'empty')).isDirectory()).toBe(true);
        expect(fs.readdirSync(root)).toEqual(['out']);
    });

    it('writes into an existing empty directory', () => {
        const out = path.join(root, 'out');
        fs.mkdirSync(out);
        writeRenderedTree(out, [file('a.txt', 'a')], { logger });
        expect(fs.readdirSync(out)).toEqual(['a.txt']);
    });

    it('refuses a non-empty output directory without force', () => {
        const out = path.join(root, 'out');
        fs.mkdirSync(out);
        fs.writeFileSync(path.join(out, 'keep.txt'), 'old');

        let caught: unknown;
        try {
            writeRenderedTree(out, [file('a.txt', 'a')], { logger });
        } catch (err) {
            caught = err;
        }
        expect(caught).toBeInstanceOf(IoError);
        if (!(caught instanceof IoError)) return;
        expect(caught.code).toBe('OutputExists');
        expect(fs.readFileSync(path.join(out, 'keep.txt'), 'utf8')).toBe('old');
    });

    it('refuses an output path that is a file', () => {
        const out = path.join(root, 'out');
        fs.writeFileSync(out, 'x');
        expect(() => writeRenderedTree(out, [], { logger })).toThrow(IoError);
    });

    it('replaces a non-empty directory with force', () => {
        const out = path.join(root, 'out');
        fs.mkdirSync(out);
        fs.writeFileSync(path.join(out, 'stale.txt'), 'old');

        writeRenderedTree(out, [file('fresh.txt', 'new')], { force: true, logger });

        expect(fs.readdirSync(out)).toEqual(['fresh.txt']);
        expect(fs.readdirSync(root)).toEqual(['out']);
    });

    it('leaves nothing behind when a write fails', () => {
        const out = path.join(root, 'out');
        let caught: unknown;
        try {
            // "a" is written as a file, so "a/b" cannot be created.
            writeRenderedTree(out, [file('a', 'x'), file('a/b', 'y')], { logger });
        } catch (err) {
            caught = err;
        }

        expect(caught).toBeInstanceOf(IoError);
        expect(fs.existsSync(out)).toBe(false);
        expect(fs.readdirSync(root)).toEqual([]);
    });

    it('keeps the previous output when a forced write fails', () => {
        const out = path.join(root, 'out');
        fs.mkdirSync(out);
        fs.writeFileSync(path.join(out, 'keep.txt'), 'old');

        expect(() =>
            writeRenderedTree(out, [file('a', 'x'), file('a/b', 'y')], { force: true, logger }),
        ).toThrow(IoError);

        expect(fs.readFileSync(path.join(out, 'keep.txt'), 'utf8')).toBe('old');
        expect(fs.readdirSync(root)).toEqual(['out']);
    });
});
