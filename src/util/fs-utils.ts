// src/util/fs-utils.ts

import fs from 'fs';
import path from 'path';

/**
 * Convert any path to a POSIX-style path with forward slashes.
 */
export function toPosixPath(p: string): string {
   return p.replace(/\\/g, '/');
}

/**
 * Ensure a directory exists (like mkdir -p).
 * Returns the directory path.
 */
export function ensureDirSync(dirPath: string): string {
   if (!fs.existsSync(dirPath)) {
      fs.mkdirSync(dirPath, { recursive: true });
   }
   return dirPath;
}

/**
 * Write a UTF-8 or binary file, creating parent directories if needed.
 */
export function writeFileEnsuringDirSync(filePath: string, contents: string | Buffer): void {
   ensureDirSync(path.dirname(filePath));
   fs.writeFileSync(filePath, contents);
}

/**
 * True when the path does not exist, or is a directory with no entries.
 */
export function isMissingOrEmptyDirSync(dirPath: string): boolean {
   if (!fs.existsSync(dirPath)) return true;
   const stat = fs.statSync(dirPath);
   return stat.isDirectory() && fs.readdirSync(dirPath).length === 0;
}

/**
 * Resolve an absolute path from root + relative path,
 * and assert it stays within the root.
 *
 * Throws if the resolved path escapes the root.
 */
export function resolveInside(root: string, relPath: string): string {
   const absRoot = path.resolve(root);
   const absTarget = path.resolve(absRoot, relPath);

   if (!isSubPath(absRoot, absTarget)) {
      throw new Error(
         `Attempted to resolve path outside root: ` +
         `root="${absRoot}", target="${absTarget}"`,
      );
   }

   return absTarget;
}

/**
 * Check if `target` is inside (or equal to) `base` directory.
 */
export function isSubPath(base: string, target: string): boolean {
   const absBase = path.resolve(base);
   const absTarget = path.resolve(target);

   const baseWithSep = absBase.endsWith(path.sep) ? absBase : absBase + path.sep;
   return absTarget === absBase || absTarget.startsWith(baseWithSep);
}
