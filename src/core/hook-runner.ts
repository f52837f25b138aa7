// src/core/hook-runner.ts

import {minimatch} from 'minimatch';
import type {
   GenerateHookContext,
   HookFilter,
   RenderedEntry,
   ResolvedConfiguration,
   TemplateHooks,
} from '../schema';

export function matchesFilter(pathRel: string, cfg: HookFilter): boolean {
   const {include, exclude, files} = cfg;

   const patterns: string[] = [];
   if (include?.length) patterns.push(...include);
   if (files?.length) patterns.push(...files);

   if (patterns.length) {
      const ok = patterns.some((p) => minimatch(pathRel, p, {dot: true}));
      if (!ok) return false;
   }

   if (exclude?.length) {
      const blocked = exclude.some((p) => minimatch(pathRel, p, {dot: true}));
      if (blocked) return false;
   }

   return true;
}

export class HookRunner {
   constructor(private readonly hooks: TemplateHooks = {}) {}

   /**
    * Run `postRenderFile` hooks over the rendered text files.
    *
    * Hooks run in declaration order per file; a returned string replaces
    * the content seen by later hooks. Verbatim entries are never handed
    * to hooks.
    */
   async runPostRenderFile(
      entries: readonly RenderedEntry[],
      values: ResolvedConfiguration,
   ): Promise<RenderedEntry[]> {
      const configs = this.hooks.postRenderFile ?? [];
      if (configs.length === 0) return [...entries];

      const out: RenderedEntry[] = [];
      for (const entry of entries) {
         if (entry.type !== 'file' || !entry.data || entry.verbatim) {
            out.push(entry);
            continue;
         }

         let content = entry.data.toString('utf8');
         let changed = false;
         for (const cfg of configs) {
            if (!matchesFilter(entry.path, cfg)) continue;
            const result = await cfg.fn({
               path: entry.path,
               sourcePath: entry.sourcePath,
               content,
               values,
            });
            if (typeof result === 'string') {
               content = result;
               changed = true;
            }
         }

         out.push(changed ? {...entry, data: Buffer.from(content, 'utf8')} : entry);
      }
      return out;
   }

   async runPostGenerate(ctx: GenerateHookContext): Promise<void> {
      for (const fn of this.hooks.postGenerate ?? []) {
         await fn(ctx);
      }
   }
}
