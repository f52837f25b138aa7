// src/core/manifest-loader.ts

import fs from 'fs';
import path from 'path';
import os from 'os';
import crypto from 'crypto';
import {pathToFileURL} from 'url';
import {transform} from 'esbuild';

import {MANIFEST_FILE_NAMES, type TemplateManifest} from '../schema';
import {defaultLogger} from '../util/logger';
import {ensureDirSync} from '../util/fs-utils';
import {IoError, ManifestError} from './errors';
import {normalizeManifest, parseTomlManifest} from './manifest';

const logger = defaultLogger.child('[manifest]');

export interface LoadManifestOptions {
   /**
    * Explicit manifest path (absolute or relative to cwd). When omitted the
    * template root is searched for template.config.* then template.toml.
    */
   manifestPath?: string;
}

export interface LoadManifestResult {
   manifest: TemplateManifest;

   /** Absolute template directory. */
   templateDir: string;

   /**
    * Absolute manifest path; undefined when the template has none, in
    * which case the manifest declares no options.
    */
   manifestPath: string | undefined;
}

/**
 * Locate and load the manifest of a template.
 */
export async function loadTemplateManifest(
   templateDir: string,
   options: LoadManifestOptions = {},
): Promise<LoadManifestResult> {
   const absDir = path.resolve(templateDir);

   let isDir = false;
   try {
      isDir = fs.statSync(absDir).isDirectory();
   } catch (err) {
      throw IoError.wrap(err, absDir, 'open template directory');
   }
   if (!isDir) {
      throw new IoError('ENOTDIR', absDir, `Template path "${absDir}" is not a directory.`);
   }

   const manifestPath = options.manifestPath
      ? path.resolve(options.manifestPath)
      : resolveManifestPath(absDir);

   if (!manifestPath) {
      logger.debug(`no manifest in ${absDir}; template declares no options`);
      return {manifest: {options: []}, templateDir: absDir, manifestPath: undefined};
   }

   const manifest = await importManifest(manifestPath);
   logger.debug(
      `loaded ${manifestPath}: ${manifest.options.length} option(s), ` +
      `${manifest.exclusions?.length ?? 0} exclusion rule(s)`,
   );

   return {manifest, templateDir: absDir, manifestPath};
}

function resolveManifestPath(templateDir: string): string | undefined {
   for (const file of MANIFEST_FILE_NAMES) {
      const full = path.join(templateDir, file);
      if (fs.existsSync(full)) {
         return full;
      }
   }
   return undefined;
}

/**
 * Load a manifest from the given path.
 * - .toml is parsed with @iarna/toml.
 * - .ts/.mts are transpiled with esbuild to ESM and loaded from a temp file.
 * - .js/.mjs/.cjs are imported directly.
 */
async function importManifest(manifestPath: string): Promise<TemplateManifest> {
   const ext = path.extname(manifestPath).toLowerCase();

   if (ext === '.toml') {
      let text: string;
      try {
         text = fs.readFileSync(manifestPath, 'utf8');
      } catch (err) {
         throw IoError.wrap(err, manifestPath, 'read manifest');
      }
      return parseTomlManifest(text, manifestPath);
   }

   const importPath = ext === '.ts' || ext === '.mts'
      ? await compileTsManifest(manifestPath)
      : manifestPath;

   let mod: unknown;
   try {
      mod = await import(pathToFileURL(importPath).href);
   } catch (err) {
      const detail = err instanceof Error ? err.message : String(err);
      throw new ManifestError(manifestPath, `could not be loaded: ${detail}`, undefined, err);
   }

   const exported =
      typeof mod === 'object' && mod !== null && 'default' in mod ? mod.default : mod;
   return normalizeManifest(exported, manifestPath);
}

/**
 * Transpile a TS manifest to ESM and return the compiled file path.
 * Cached on (path + mtime) so edits invalidate the temp file.
 */
async function compileTsManifest(manifestPath: string): Promise<string> {
   let source: string;
   let stat: fs.Stats;
   try {
      source = fs.readFileSync(manifestPath, 'utf8');
      stat = fs.statSync(manifestPath);
   } catch (err) {
      throw IoError.wrap(err, manifestPath, 'read manifest');
   }

   const hash = crypto
      .createHash('sha1')
      .update(manifestPath)
      .update(String(stat.mtimeMs))
      .digest('hex');

   const tmpDir = path.join(os.tmpdir(), 'template-forge-manifest');
   ensureDirSync(tmpDir);

   const tmpFile = path.join(tmpDir, `${hash}.mjs`);

   if (!fs.existsSync(tmpFile)) {
      try {
         const result = await transform(source, {
            loader: 'ts',
            format: 'esm',
            sourcemap: 'inline',
            sourcefile: manifestPath,
            target: 'node20',
         });
         fs.writeFileSync(tmpFile, result.code, 'utf8');
      } catch (err) {
         const detail = err instanceof Error ? err.message : String(err);
         throw new ManifestError(manifestPath, `could not be compiled: ${detail}`, undefined, err);
      }
   }

   return tmpFile;
}
