// src/core/manifest.ts

import * as TOML from '@iarna/toml';
import type {
   DerivedPlaceholder,
   ExclusionRule,
   GenerateHookContext,
   GenerateHookFn,
   OptionDefinition,
   OptionKind,
   RenderFileHookConfig,
   RenderFileHookContext,
   TemplateHooks,
   TemplateManifest,
   TemplateSyntax,
} from '../schema';
import {ManifestError} from './errors';

type UnknownRecord = Record<string, unknown>;

const SYNTAX_KEYS: ReadonlyArray<[tomlKey: string, key: keyof TemplateSyntax]> = [
   ['placeholder_start', 'placeholderStart'],
   ['placeholder_end', 'placeholderEnd'],
   ['block_start', 'blockStart'],
   ['block_end', 'blockEnd'],
];

const PLACEHOLDER_KEYS = new Set(['type', 'prompt', 'default', 'regex', 'choices']);

/**
 * Parse a `template.toml` manifest.
 *
 * Layout:
 *   [template]                      name, description, exclude, copy_without_render
 *   [syntax]                        placeholder_start/_end, block_start/_end
 *   [placeholders.<name>]           type, prompt, default, regex, choices
 *   [conditional.'<expr>']          ignore = [...]
 *   [conditional.'<expr>'.placeholders]  <name> = { ... }
 *   [derived.<name>]                from, transform
 */
export function parseTomlManifest(text: string, file: string): TemplateManifest {
   let doc: UnknownRecord;
   try {
      doc = TOML.parse(text);
   } catch (err) {
      const detail = err instanceof Error ? err.message : String(err);
      throw new ManifestError(file, `is not valid TOML: ${detail}`, undefined, err);
   }

   const reader = new FieldReader(file);
   const manifest: TemplateManifest = {options: [], exclusions: [], derived: []};
   const options = manifest.options;
   const exclusions: ExclusionRule[] = [];
   const derived: DerivedPlaceholder[] = [];

   const template = reader.optionalTable(doc, 'template');
   if (template) {
      manifest.name = reader.optionalString(template, 'name', 'template.name');
      manifest.description = reader.optionalString(template, 'description', 'template.description');
      const exclude = reader.optionalStringArray(template, 'exclude', 'template.exclude');
      if (exclude?.length) exclusions.push({when: 'true', paths: exclude});
      manifest.copyWithoutRender = reader.optionalStringArray(
         template,
         'copy_without_render',
         'template.copy_without_render',
      );
   }

   const syntax = reader.optionalTable(doc, 'syntax');
   if (syntax) {
      const partial: Partial<TemplateSyntax> = {};
      for (const [tomlKey, key] of SYNTAX_KEYS) {
         const value = reader.optionalString(syntax, tomlKey, `syntax.${tomlKey}`);
         if (value !== undefined) partial[key] = value;
      }
      manifest.syntax = partial;
   }

   const placeholders = reader.optionalTable(doc, 'placeholders');
   if (placeholders) {
      for (const [name, value] of Object.entries(placeholders)) {
         options.push(tomlPlaceholder(reader, name, value, `placeholders.${name}`, undefined));
      }
   }

   const conditional = reader.optionalTable(doc, 'conditional');
   if (conditional) {
      for (const [condition, value] of Object.entries(conditional)) {
         const field = `conditional.'${condition}'`;
         const table = reader.table(value, field);

         for (const key of Object.keys(table)) {
            if (key !== 'ignore' && key !== 'placeholders') {
               throw new ManifestError(file, `has unknown key "${key}"`, field);
            }
         }

         const ignore = reader.optionalStringArray(table, 'ignore', `${field}.ignore`);
         if (ignore?.length) exclusions.push({when: condition, paths: ignore});

         const nested = reader.optionalTable(table, 'placeholders');
         if (nested) {
            for (const [name, def] of Object.entries(nested)) {
               options.push(tomlPlaceholder(reader, name, def, `${field}.placeholders.${name}`, condition));
            }
         }
      }
   }

   const derivedTable = reader.optionalTable(doc, 'derived');
   if (derivedTable) {
      for (const [name, value] of Object.entries(derivedTable)) {
         const field = `derived.${name}`;
         const table = reader.table(value, field);
         derived.push({
            name,
            from: reader.string(table, 'from', `${field}.from`),
            transform: reader.string(table, 'transform', `${field}.transform`),
         });
      }
   }

   manifest.exclusions = exclusions;
   manifest.derived = derived;
   return manifest;
}

/**
 * Validate a manifest exported from a code file (`template.config.*`).
 * The module value is untrusted, so every field is checked.
 */
export function normalizeManifest(value: unknown, file: string): TemplateManifest {
   const reader = new FieldReader(file);
   const root = reader.table(value, '<export>');

   const optionsRaw = root['options'];
   if (!Array.isArray(optionsRaw)) {
      throw new ManifestError(file, 'must be an array', 'options');
   }

   const manifest: TemplateManifest = {
      name: reader.optionalString(root, 'name', 'name'),
      description: reader.optionalString(root, 'description', 'description'),
      options: optionsRaw.map((raw, i) => codeOption(reader, raw, `options[${i}]`)),
      exclusions: reader.optionalArray(root, 'exclusions', 'exclusions', (raw, field) => {
         const t = reader.table(raw, field);
         return {
            when: reader.string(t, 'when', `${field}.when`),
            paths: reader.stringArray(t, 'paths', `${field}.paths`),
         };
      }),
      derived: reader.optionalArray(root, 'derived', 'derived', (raw, field) => {
         const t = reader.table(raw, field);
         return {
            name: reader.string(t, 'name', `${field}.name`),
            from: reader.string(t, 'from', `${field}.from`),
            transform: reader.string(t, 'transform', `${field}.transform`),
         };
      }),
      copyWithoutRender: reader.optionalStringArray(root, 'copyWithoutRender', 'copyWithoutRender'),
   };

   const syntax = reader.optionalTable(root, 'syntax');
   if (syntax) {
      const partial: Partial<TemplateSyntax> = {};
      for (const [, key] of SYNTAX_KEYS) {
         const v = reader.optionalString(syntax, key, `syntax.${key}`);
         if (v !== undefined) partial[key] = v;
      }
      manifest.syntax = partial;
   }

   const hooks = reader.optionalTable(root, 'hooks');
   if (hooks) manifest.hooks = codeHooks(reader, hooks);

   return manifest;
}

// ---------------------------------------------------------------------------
// Internal: TOML placeholders
// ---------------------------------------------------------------------------

function tomlPlaceholder(
   reader: FieldReader,
   name: string,
   value: unknown,
   field: string,
   when: string | undefined,
): OptionDefinition {
   const table = reader.table(value, field);

   for (const key of Object.keys(table)) {
      if (!PLACEHOLDER_KEYS.has(key)) {
         throw new ManifestError(reader.file, `has unknown key "${key}"`, field);
      }
   }

   const type = reader.string(table, 'type', `${field}.type`);
   const choices = reader.optionalStringArray(table, 'choices', `${field}.choices`);

   let kind: OptionKind;
   if (type === 'bool' || type === 'boolean') {
      if (choices) throw new ManifestError(reader.file, 'is not allowed on bool placeholders', `${field}.choices`);
      kind = {type: 'boolean'};
   } else if (type === 'string') {
      kind = choices ? {type: 'enum', choices} : {type: 'string'};
   } else {
      throw new ManifestError(reader.file, `must be "string" or "bool", got "${type}"`, `${field}.type`);
   }

   const rawDefault = table['default'];
   const def = typeof rawDefault === 'number' ? String(rawDefault) : rawDefault;
   if (def !== undefined && typeof def !== 'boolean' && typeof def !== 'string') {
      throw new ManifestError(reader.file, 'must be a string, boolean or number', `${field}.default`);
   }

   return {
      name,
      kind,
      default: def,
      regex: reader.optionalString(table, 'regex', `${field}.regex`),
      prompt: reader.optionalString(table, 'prompt', `${field}.prompt`),
      when,
   };
}

// ---------------------------------------------------------------------------
// Internal: code manifests
// ---------------------------------------------------------------------------

function codeOption(reader: FieldReader, raw: unknown, field: string): OptionDefinition {
   const table = reader.table(raw, field);
   const kindTable = reader.table(table['kind'], `${field}.kind`);
   const type = reader.string(kindTable, 'type', `${field}.kind.type`);

   let kind: OptionKind;
   if (type === 'boolean' || type === 'string') {
      kind = {type};
   } else if (type === 'enum') {
      kind = {type, choices: reader.stringArray(kindTable, 'choices', `${field}.kind.choices`)};
   } else {
      throw new ManifestError(reader.file, `must be "boolean", "string" or "enum", got "${type}"`, `${field}.kind.type`);
   }

   const def = table['default'];
   if (def !== undefined && typeof def !== 'boolean' && typeof def !== 'string') {
      throw new ManifestError(reader.file, 'must be a string or boolean', `${field}.default`);
   }

   return {
      name: reader.string(table, 'name', `${field}.name`),
      kind,
      default: def,
      regex: reader.optionalString(table, 'regex', `${field}.regex`),
      prompt: reader.optionalString(table, 'prompt', `${field}.prompt`),
      when: reader.optionalString(table, 'when', `${field}.when`),
   };
}

function isRenderFileHook(value: unknown): value is (ctx: RenderFileHookContext) => unknown {
   return typeof value === 'function';
}

function isGenerateHook(value: unknown): value is (ctx: GenerateHookContext) => unknown {
   return typeof value === 'function';
}

function codeHooks(reader: FieldReader, hooks: UnknownRecord): TemplateHooks {
   const postRenderFile = reader.optionalArray(
      hooks,
      'postRenderFile',
      'hooks.postRenderFile',
      (raw, field): RenderFileHookConfig => {
         const t = reader.table(raw, field);
         const fn = t['fn'];
         if (!isRenderFileHook(fn)) {
            throw new ManifestError(reader.file, 'must be a function', `${field}.fn`);
         }
         return {
            include: reader.optionalStringArray(t, 'include', `${field}.include`),
            exclude: reader.optionalStringArray(t, 'exclude', `${field}.exclude`),
            files: reader.optionalStringArray(t, 'files', `${field}.files`),
            fn: async (ctx) => {
               const result = await fn(ctx);
               return typeof result === 'string' ? result : undefined;
            },
         };
      },
   );

   const postGenerate = reader.optionalArray(
      hooks,
      'postGenerate',
      'hooks.postGenerate',
      (raw, field): GenerateHookFn => {
         if (!isGenerateHook(raw)) {
            throw new ManifestError(reader.file, 'must be a function', field);
         }
         return async (ctx) => {
            await raw(ctx);
         };
      },
   );

   return {postRenderFile, postGenerate};
}

// ---------------------------------------------------------------------------
// Internal: typed field access with ManifestError on mismatch
// ---------------------------------------------------------------------------

function isRecord(value: unknown): value is UnknownRecord {
   return typeof value === 'object' && value !== null && !Array.isArray(value);
}

class FieldReader {
   constructor(readonly file: string) {}

   table(value: unknown, field: string): UnknownRecord {
      if (!isRecord(value)) {
         throw new ManifestError(this.file, 'must be a table/object', field);
      }
      return value;
   }

   optionalTable(parent: UnknownRecord, key: string): UnknownRecord | undefined {
      const value = parent[key];
      return value === undefined ? undefined : this.table(value, key);
   }

   string(parent: UnknownRecord, key: string, field: string): string {
      const value = parent[key];
      if (typeof value !== 'string') {
         throw new ManifestError(this.file, `must be a string, got ${describe(value)}`, field);
      }
      return value;
   }

   optionalString(parent: UnknownRecord, key: string, field: string): string | undefined {
      return parent[key] === undefined ? undefined : this.string(parent, key, field);
   }

   stringArray(parent: UnknownRecord, key: string, field: string): string[] {
      const value = parent[key];
      if (!Array.isArray(value) || !value.every((v): v is string => typeof v === 'string')) {
         throw new ManifestError(this.file, 'must be an array of strings', field);
      }
      return [...value];
   }

   optionalStringArray(parent: UnknownRecord, key: string, field: string): string[] | undefined {
      return parent[key] === undefined ? undefined : this.stringArray(parent, key, field);
   }

   optionalArray<T>(
      parent: UnknownRecord,
      key: string,
      field: string,
      map: (raw: unknown, field: string) => T,
   ): T[] | undefined {
      const value = parent[key];
      if (value === undefined) return undefined;
      if (!Array.isArray(value)) {
         throw new ManifestError(this.file, 'must be an array', field);
      }
      return value.map((raw: unknown, i) => map(raw, `${field}[${i}]`));
   }
}

function describe(value: unknown): string {
   if (value === undefined) return 'nothing';
   if (Array.isArray(value)) return 'an array';
   return typeof value;
}
