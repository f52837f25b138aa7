// src/core/template-tree.ts

import fs from 'fs';
import path from 'path';
import type {TemplateDirectory, TemplateFile, TemplateNode} from '../schema';
import {MANIFEST_FILE_NAMES} from '../schema';
import {toPosixPath} from '../util/fs-utils';
import {IoError} from './errors';

/**
 * Directory names never read from a template.
 */
const ALWAYS_SKIPPED = new Set(['.git', 'node_modules']);

export interface ReadTemplateTreeOptions {
   /**
    * Additional absolute paths to skip (e.g. a custom manifest, or an
    * output directory nested inside the template).
    */
   skip?: string[];
}

/**
 * Read a template directory into an immutable node tree.
 *
 * - Children are sorted by name so output listings are deterministic.
 * - `.git/`, `node_modules/` and root manifest files are skipped.
 * - Filesystem failures are wrapped in IoError.
 */
export function readTemplateTree(
   templateDir: string,
   options: ReadTemplateTreeOptions = {},
): TemplateDirectory {
   const rootAbs = path.resolve(templateDir);
   const skip = new Set((options.skip ?? []).map((p) => path.resolve(p)));
   for (const name of MANIFEST_FILE_NAMES) {
      skip.add(path.join(rootAbs, name));
   }

   function readDir(absDir: string, relDir: string): TemplateNode[] {
      let names: string[];
      try {
         names = fs.readdirSync(absDir);
      } catch (err) {
         throw IoError.wrap(err, absDir, 'read directory');
      }

      const nodes: TemplateNode[] = [];
      for (const name of names.sort(compareNames)) {
         if (ALWAYS_SKIPPED.has(name)) continue;

         const abs = path.join(absDir, name);
         if (skip.has(abs)) continue;

         const rel = relDir ? `${relDir}/${name}` : name;

         let stat: fs.Stats;
         try {
            stat = fs.statSync(abs);
         } catch (err) {
            throw IoError.wrap(err, abs, 'stat');
         }

         if (stat.isDirectory()) {
            nodes.push({type: 'dir', name, path: rel, children: readDir(abs, rel)});
         } else if (stat.isFile()) {
            let data: Buffer;
            try {
               data = fs.readFileSync(abs);
            } catch (err) {
               throw IoError.wrap(err, abs, 'read');
            }
            nodes.push({type: 'file', name, path: rel, data});
         }
      }
      return nodes;
   }

   return {type: 'dir', name: '', path: '', children: readDir(rootAbs, '')};
}

/**
 * Build a template tree from a flat map of template-relative paths to
 * contents. Intermediate directories are created as needed; a key ending
 * in "/" declares an (empty) directory.
 */
export function buildTemplateTree(
   files: Readonly<Record<string, string | Buffer>>,
): TemplateDirectory {
   const root: TemplateDirectory = {type: 'dir', name: '', path: '', children: []};

   const ensureDir = (segments: string[]): TemplateDirectory => {
      let dir = root;
      for (const segment of segments) {
         const childPath = dir.path ? `${dir.path}/${segment}` : segment;
         let next = dir.children.find(
            (c): c is TemplateDirectory => c.type === 'dir' && c.name === segment,
         );
         if (!next) {
            next = {type: 'dir', name: segment, path: childPath, children: []};
            dir.children.push(next);
         }
         dir = next;
      }
      return dir;
   };

   for (const [key, contents] of Object.entries(files)) {
      const rel = toPosixPath(key).replace(/^\/+/, '');
      const isDir = rel.endsWith('/');
      const segments = rel.split('/').filter(Boolean);
      if (segments.length === 0) continue;

      if (isDir) {
         ensureDir(segments);
         continue;
      }

      const name = segments[segments.length - 1];
      const parent = ensureDir(segments.slice(0, -1));
      const file: TemplateFile = {
         type: 'file',
         name,
         path: segments.join('/'),
         data: typeof contents === 'string' ? Buffer.from(contents, 'utf8') : contents,
      };
      parent.children.push(file);
   }

   sortTree(root);
   return root;
}

function sortTree(dir: TemplateDirectory): void {
   dir.children.sort((a, b) => compareNames(a.name, b.name));
   for (const child of dir.children) {
      if (child.type === 'dir') sortTree(child);
   }
}

/**
 * Code-unit order; independent of the process locale.
 */
function compareNames(a: string, b: string): number {
   if (a === b) return 0;
   return a < b ? -1 : 1;
}
