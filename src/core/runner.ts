// src/core/runner.ts

import path from 'path';
import {loadTemplateManifest} from './manifest-loader';
import {HookRunner} from './hook-runner';
import {collectAnswers, type AskFn} from './prompt';
import {compileSchema, resolveOptions, unusedOverrides} from './resolve-options';
import {compileRules, computeExclusions} from './rule-engine';
import {readTemplateTree} from './template-tree';
import {renderTree} from './render-tree';
import {writeRenderedTree} from './write-output';
import type {
   OptionOverrides,
   RenderedEntry,
   ResolvedConfiguration,
   TemplateManifest,
} from '../schema';
import type {Logger} from '../util/logger';
import {defaultLogger} from '../util/logger';

export interface PlanOptions {
   /** Template directory (absolute or relative to cwd). */
   templateDir: string;

   /** Caller-supplied option values (`-D key=value`). */
   defines?: OptionOverrides;

   /** Explicit manifest path; defaults to the lookup in the template root. */
   manifestPath?: string;

   /**
    * Interactive answer source. When set, every active option without a
    * define is asked for before resolution.
    */
   ask?: AskFn;

   /**
    * Absolute paths never read as template content (e.g. an output
    * directory placed inside the template).
    */
   skip?: string[];

   logger?: Logger;
}

export interface GenerationPlan {
   manifest: TemplateManifest;
   templateDir: string;
   values: ResolvedConfiguration;
   /** Active exclusion patterns, sorted. */
   excluded: string[];
   /** Rendered entries, after postRenderFile hooks. */
   entries: RenderedEntry[];
   hooks: HookRunner;
}

export interface GenerateOptions extends PlanOptions {
   outDir: string;

   /** Replace a non-empty output directory. */
   force?: boolean;

   /** Render everything but write nothing (hooks after write are skipped). */
   dryRun?: boolean;
}

export interface GenerateResult {
   /** Absolute output directory. */
   outDir: string;
   values: ResolvedConfiguration;
   excluded: string[];
   entries: RenderedEntry[];
   /** False for dry runs. */
   written: boolean;
}

/**
 * Load, resolve and render a template entirely in memory.
 *
 * Every failure (manifest, schema, rules, rendering, hooks) surfaces
 * here, before anything touches the output directory.
 */
export async function planGeneration(options: PlanOptions): Promise<GenerationPlan> {
   const logger = options.logger ?? defaultLogger.child('[runner]');
   const defines = options.defines ?? {};

   const {manifest, templateDir, manifestPath} = await loadTemplateManifest(options.templateDir, {
      manifestPath: options.manifestPath,
   });

   const schema = compileSchema({options: manifest.options, derived: manifest.derived});
   const rules = compileRules(manifest.exclusions ?? [], schema.optionNames);

   const supplied = options.ask ? await collectAnswers(schema, defines, options.ask) : defines;
   const values = resolveOptions(schema, supplied);

   for (const key of unusedOverrides(defines, values)) {
      logger.warn(
         schema.optionNames.has(key)
            ? `"${key}" is inactive for this configuration; value ignored`
            : `"${key}" is not an option of this template; value ignored`,
      );
   }

   const exclusions = computeExclusions(rules, values);
   const excluded = [...exclusions].sort();
   logger.debug(`excluded: ${excluded.length ? excluded.join(', ') : '(none)'}`);

   const skip = [...(options.skip ?? [])];
   if (manifestPath) skip.push(manifestPath);

   const tree = readTemplateTree(templateDir, {skip});
   const rendered = renderTree(tree, {
      values,
      exclusions,
      syntax: manifest.syntax,
      copyWithoutRender: manifest.copyWithoutRender,
   });

   const hooks = new HookRunner(manifest.hooks);
   const entries = await hooks.runPostRenderFile(rendered, values);

   return {manifest, templateDir, values, excluded, entries, hooks};
}

/**
 * Generate a project from a template.
 *
 * The output directory appears complete or not at all.
 */
export async function generate(options: GenerateOptions): Promise<GenerateResult> {
   const logger = options.logger ?? defaultLogger.child('[runner]');
   const outDir = path.resolve(options.outDir);

   const plan = await planGeneration({
      ...options,
      logger,
      skip: [...(options.skip ?? []), outDir],
   });

   const label = plan.manifest.name ?? path.basename(plan.templateDir);
   const fileCount = plan.entries.filter((e) => e.type === 'file').length;

   if (options.dryRun) {
      logger.info(`[dry-run] ${label}: would write ${fileCount} file(s) to ${outDir}`);
      for (const entry of plan.entries) {
         logger.info(`  ${entry.type === 'dir' ? `${entry.path}/` : entry.path}`);
      }
      return {outDir, values: plan.values, excluded: plan.excluded, entries: plan.entries, written: false};
   }

   writeRenderedTree(outDir, plan.entries, {force: options.force, logger: logger.child('[write]')});
   logger.info(`${label}: wrote ${fileCount} file(s) to ${outDir}`);

   await plan.hooks.runPostGenerate({outDir, values: plan.values});

   return {outDir, values: plan.values, excluded: plan.excluded, entries: plan.entries, written: true};
}
