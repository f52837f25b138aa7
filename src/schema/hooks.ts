// src/schema/hooks.ts

import type {ResolvedConfiguration} from './options';

/**
 * Context passed to `postRenderFile` hooks.
 */
export interface RenderFileHookContext {
   /**
    * Output-relative POSIX path of the rendered file.
    * Example: "src/my-lib/lib.rs".
    */
   path: string;

   /**
    * Template-relative path the file came from.
    * Example: "src/{{project-name}}/lib.rs".
    */
   sourcePath: string;

   /** Rendered text content. */
   content: string;

   values: ResolvedConfiguration;
}

export interface GenerateHookContext {
   /** Absolute path of the committed output directory. */
   outDir: string;
   values: ResolvedConfiguration;
}

/**
 * Glob filters evaluated against the output path.
 */
export interface HookFilter {
   /**
    * Glob patterns which must match for the hook to run.
    * If provided, at least one pattern must match.
    */
   include?: string[];

   /**
    * Glob patterns which, if any match, prevent the hook from running.
    */
   exclude?: string[];

   /**
    * Explicit file paths, treated like `include`.
    */
   files?: string[];
}

/**
 * Return a string to replace the file content; return nothing to keep it.
 */
export type RenderFileHookFn = (
   ctx: RenderFileHookContext,
) => string | void | Promise<string | void>;

export type GenerateHookFn = (ctx: GenerateHookContext) => void | Promise<void>;

export interface RenderFileHookConfig extends HookFilter {
   fn: RenderFileHookFn;
}

/**
 * Hooks declared in code manifests.
 *
 * - postRenderFile: runs in memory for each rendered text file, before
 *   anything is written. May return replacement content.
 * - postGenerate  : runs once after the output directory is in place.
 */
export interface TemplateHooks {
   postRenderFile?: RenderFileHookConfig[];
   postGenerate?: GenerateHookFn[];
}
