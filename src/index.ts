// src/index.ts

export * from './schema';
export * from './core/errors';

export {
   compileSchema,
   orderOptions,
   resolveOptions,
   unusedOverrides,
   coerceValue,
   checkValue,
   type OptionSchema,
   type CompiledSchema,
   type CompiledOption,
} from './core/resolve-options';
export {
   evaluate,
   evaluateSource,
   compileExpression,
   compileRules,
   computeExclusions,
   isPathExcluded,
   type CompiledRule,
   type ExclusionSet,
} from './core/rule-engine';
export {getFilter, isKnownFilter, filterNames, splitWords, type FilterFn} from './core/filters';
export {renderText, type RenderContext} from './core/render-text';
export {renderTree, isBinary, type RenderTreeOptions} from './core/render-tree';
export {readTemplateTree, buildTemplateTree, type ReadTemplateTreeOptions} from './core/template-tree';
export {writeRenderedTree, type WriteOutputOptions} from './core/write-output';
export {parseTomlManifest, normalizeManifest} from './core/manifest';
export {
   loadTemplateManifest,
   type LoadManifestOptions,
   type LoadManifestResult,
} from './core/manifest-loader';
export {HookRunner, matchesFilter} from './core/hook-runner';
export {collectAnswers, parseAnswer, type AskFn, type PromptQuestion} from './core/prompt';
export {
   generate,
   planGeneration,
   type GenerateOptions,
   type GenerateResult,
   type GenerationPlan,
   type PlanOptions,
} from './core/runner';
export {
   generateMatrix,
   loadMatrixFile,
   isSafeEntryName,
   type Matrix,
   type MatrixOptions,
   type MatrixOutcome,
} from './core/matrix';
export {watchTemplate, type WatchOptions, type TemplateWatcher} from './core/watcher';
export {
   checkTemplate,
   type CheckOptions,
   type Diagnostic,
   type DiagnosticCode,
   type DiagnosticSeverity,
} from './core/check-template';
export {initTemplate, type InitTemplateOptions, type InitTemplateResult} from './core/init-template';
export {Logger, defaultLogger, parseLogLevel, type LogLevel, type LoggerOptions} from './util/logger';
