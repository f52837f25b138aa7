// src/core/write-output.ts

import crypto from 'crypto';
import fs from 'fs';
import path from 'path';
import type {RenderedEntry} from '../schema';
import {ensureDirSync, isMissingOrEmptyDirSync, resolveInside, writeFileEnsuringDirSync} from '../util/fs-utils';
import {defaultLogger, type Logger} from '../util/logger';
import {IoError} from './errors';

export interface WriteOutputOptions {
   /**
    * Replace an existing, non-empty output directory.
    */
   force?: boolean;

   /**
    * Optional logger; defaults to defaultLogger.child('[write]').
    */
   logger?: Logger;
}

/**
 * Write rendered entries to `outDir` without ever exposing a partial tree.
 *
 * Entries are written into a hidden sibling directory which is renamed
 * onto `outDir` once complete. A previous `outDir` (force mode) is moved
 * aside first and restored if the final rename fails. On any failure the
 * temporary directory is removed and an IoError is thrown.
 *
 * @returns the absolute output directory.
 */
export function writeRenderedTree(
   outDir: string,
   entries: readonly RenderedEntry[],
   options: WriteOutputOptions = {},
): string {
   const logger = options.logger ?? defaultLogger.child('[write]');
   const outAbs = path.resolve(outDir);

   if (fs.existsSync(outAbs)) {
      const isDir = fs.statSync(outAbs).isDirectory();
      if (!isDir || (!options.force && !isMissingOrEmptyDirSync(outAbs))) {
         throw new IoError(
            'OutputExists',
            outAbs,
            `Output path "${outAbs}" already exists${isDir ? ' and is not empty' : ''}; use --force to replace it.`,
         );
      }
   }

   const parent = path.dirname(outAbs);
   const suffix = crypto.randomBytes(6).toString('hex');
   const tmpDir = path.join(parent, `.${path.basename(outAbs)}.tforge-${suffix}`);
   const previousDir = `${tmpDir}.old`;

   try {
      ensureDirSync(parent);
      fs.mkdirSync(tmpDir);

      for (const entry of entries) {
         const target = resolveInside(tmpDir, entry.path);
         if (entry.type === 'dir') {
            ensureDirSync(target);
         } else {
            writeFileEnsuringDirSync(target, entry.data ?? Buffer.alloc(0));
         }
      }
      logger.debug(`wrote ${entries.length} entries to ${tmpDir}`);

      const hadPrevious = fs.existsSync(outAbs);
      if (hadPrevious) fs.renameSync(outAbs, previousDir);

      try {
         fs.renameSync(tmpDir, outAbs);
      } catch (err) {
         if (hadPrevious) fs.renameSync(previousDir, outAbs);
         throw err;
      }

      if (hadPrevious) fs.rmSync(previousDir, {recursive: true, force: true});
   } catch (err) {
      removeQuietly(tmpDir, logger);
      throw IoError.wrap(err, outAbs, 'write output');
   }

   return outAbs;
}

function removeQuietly(dir: string, logger: Logger): void {
   try {
      fs.rmSync(dir, {recursive: true, force: true});
   } catch (err) {
      logger.warn(`could not remove temporary directory ${dir}`, err);
   }
}
