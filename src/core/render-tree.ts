// src/core/render-tree.ts

import {isUtf8} from 'buffer';
import {minimatch} from 'minimatch';
import type {
   RenderedEntry,
   ResolvedConfiguration,
   TemplateDirectory,
   TemplateFile,
   TemplateNode,
   TemplateSyntax,
} from '../schema';
import {TEMPLATE_FILE_SUFFIX} from '../schema';
import {RenderError} from './errors';
import {renderText} from './render-text';
import {isPathExcluded, type ExclusionSet} from './rule-engine';

export interface RenderTreeOptions {
   values: ResolvedConfiguration;
   exclusions: ExclusionSet;
   syntax?: Partial<TemplateSyntax>;
   /**
    * Template-relative globs for files copied byte for byte.
    */
   copyWithoutRender?: readonly string[];
}

/**
 * Render a template tree into an ordered list of output entries.
 *
 * Pure and deterministic: nothing is written, and identical inputs yield
 * identical entries. Excluded nodes are skipped before their names or
 * contents are looked at.
 */
export function renderTree(root: TemplateDirectory, opts: RenderTreeOptions): RenderedEntry[] {
   const entries: RenderedEntry[] = [];
   const producedBy = new Map<string, string>();
   const ctx = {values: opts.values, syntax: opts.syntax};
   const verbatim = opts.copyWithoutRender ?? [];

   function outputName(node: TemplateNode): string {
      let name = renderText(node.name, ctx, node.path);

      if (
         name === '' ||
         name === '.' ||
         name === '..' ||
         name.includes('/') ||
         name.includes('\\')
      ) {
         throw new RenderError({
            code: 'InvalidPath',
            detail: `Path segment "${node.name}" renders to invalid name "${name}"`,
            file: node.path,
            text: node.name,
            offset: 0,
            token: name,
         });
      }

      if (
         node.type === 'file' &&
         name.endsWith(TEMPLATE_FILE_SUFFIX) &&
         name.length > TEMPLATE_FILE_SUFFIX.length
      ) {
         name = name.slice(0, -TEMPLATE_FILE_SUFFIX.length);
      }

      return name;
   }

   function claim(outPath: string, node: TemplateNode): void {
      const previous = producedBy.get(outPath);
      if (previous !== undefined) {
         throw new RenderError({
            code: 'PathCollision',
            detail: `"${outPath}" is produced by both "${previous}" and "${node.path}"`,
            file: node.path,
            text: node.name,
            offset: 0,
            token: outPath,
         });
      }
      producedBy.set(outPath, node.path);
   }

   function isVerbatim(node: TemplateFile): boolean {
      return isBinary(node.data) || verbatim.some((p) => minimatch(node.path, p, {dot: true}));
   }

   function walk(children: TemplateNode[], outParent: string): void {
      for (const node of children) {
         if (isPathExcluded(node.path, opts.exclusions)) continue;

         const name = outputName(node);
         const outPath = outParent ? `${outParent}/${name}` : name;
         claim(outPath, node);

         if (node.type === 'dir') {
            entries.push({type: 'dir', path: outPath, sourcePath: node.path});
            walk(node.children, outPath);
         } else {
            if (isVerbatim(node)) {
               entries.push({type: 'file', path: outPath, sourcePath: node.path, data: node.data, verbatim: true});
            } else {
               const text = renderText(node.data.toString('utf8'), ctx, node.path);
               entries.push({type: 'file', path: outPath, sourcePath: node.path, data: Buffer.from(text, 'utf8')});
            }
         }
      }
   }

   walk(root.children, '');
   return entries;
}

/**
 * Files containing a NUL byte, or that are not valid UTF-8, are treated
 * as binary and never decoded.
 */
export function isBinary(data: Buffer): boolean {
   return data.includes(0) || !isUtf8(data);
}
