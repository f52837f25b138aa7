// src/core/matrix.ts

import fs from 'fs';
import path from 'path';
import * as TOML from '@iarna/toml';
import type {OptionOverrides, OptionValue} from '../schema';
import type {Logger} from '../util/logger';
import {defaultLogger} from '../util/logger';
import {IoError, ManifestError} from './errors';
import {generate, type GenerateResult} from './runner';

/** Entry name → option values for that entry. */
export type Matrix = Readonly<Record<string, OptionOverrides>>;

export interface MatrixOptions {
   templateDir: string;
   /** Each entry is generated into `<outRoot>/<entry name>`. */
   outRoot: string;
   matrix: Matrix;
   manifestPath?: string;
   force?: boolean;
   logger?: Logger;
}

export type MatrixOutcome =
   | {name: string; outDir: string; ok: true; result: GenerateResult}
   | {name: string; outDir: string; ok: false; error: unknown};

const ENTRY_NAME = /^[A-Za-z0-9_][A-Za-z0-9._-]*$/;

export function isSafeEntryName(name: string): boolean {
   return ENTRY_NAME.test(name);
}

/**
 * Generate every matrix entry in parallel. Individual failures are
 * reported in the outcomes, never thrown.
 */
export async function generateMatrix(options: MatrixOptions): Promise<MatrixOutcome[]> {
   const logger = options.logger ?? defaultLogger.child('[matrix]');
   const outRoot = path.resolve(options.outRoot);
   const names = Object.keys(options.matrix);

   const settled = await Promise.allSettled(
      names.map(async (name) => {
         if (!isSafeEntryName(name)) {
            throw new ManifestError('<matrix>', `entry name "${name}" is not a safe directory name`);
         }
         return generate({
            templateDir: options.templateDir,
            outDir: path.join(outRoot, name),
            defines: options.matrix[name],
            manifestPath: options.manifestPath,
            force: options.force,
            skip: [outRoot],
            logger: logger.child(`[${name}]`),
         });
      }),
   );

   return settled.map((s, i): MatrixOutcome => {
      const name = names[i];
      const outDir = path.join(outRoot, name);
      if (s.status === 'fulfilled') {
         return {name, outDir, ok: true, result: s.value};
      }
      logger.error(`${name}: ${s.reason instanceof Error ? s.reason.message : String(s.reason)}`);
      return {name, outDir, ok: false, error: s.reason};
   });
}

/**
 * Read a matrix file: one TOML table per entry, mapping option names to
 * values. Numbers are taken as strings.
 *
 * ```toml
 * [minimal]
 * project-name = "demo"
 * bench = false
 * ```
 */
export function loadMatrixFile(file: string): Matrix {
   let text: string;
   try {
      text = fs.readFileSync(file, 'utf8');
   } catch (err) {
      throw IoError.wrap(err, file, 'read matrix file');
   }

   let doc: Record<string, unknown>;
   try {
      doc = TOML.parse(text);
   } catch (err) {
      const detail = err instanceof Error ? err.message : String(err);
      throw new ManifestError(file, `is not valid TOML: ${detail}`, undefined, err);
   }

   const matrix: Record<string, OptionOverrides> = {};
   for (const [name, entry] of Object.entries(doc)) {
      if (!isSafeEntryName(name)) {
         throw new ManifestError(file, 'is not a safe directory name', name);
      }
      if (typeof entry !== 'object' || entry === null || Array.isArray(entry)) {
         throw new ManifestError(file, 'must be a table of option values', name);
      }

      const values: Record<string, OptionValue> = {};
      for (const [key, value] of Object.entries(entry)) {
         if (typeof value === 'boolean' || typeof value === 'string') {
            values[key] = value;
         } else if (typeof value === 'number') {
            values[key] = String(value);
         } else {
            throw new ManifestError(file, 'must be a string, boolean or number', `${name}.${key}`);
         }
      }
      matrix[name] = values;
   }
   return matrix;
}
