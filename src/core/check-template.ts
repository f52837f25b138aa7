// src/core/check-template.ts

import {minimatch} from 'minimatch';
import {identifierNodes} from '../ast/expression';
import {collectConditions, collectPlaceholders, parseTemplate, type TemplateAstNode} from '../ast/template';
import type {TemplateDirectory, TemplateManifest, TemplateNode} from '../schema';
import {ManifestError, RenderError, RuleError, SchemaError, locate} from './errors';
import {isKnownFilter} from './filters';
import {loadTemplateManifest} from './manifest-loader';
import {isBinary} from './render-tree';
import {compileSchema, type CompiledSchema} from './resolve-options';
import {compileRules} from './rule-engine';
import {readTemplateTree} from './template-tree';

export type DiagnosticSeverity = 'error' | 'warning';

export type DiagnosticCode =
   | 'manifest-error'
   | 'schema-error'
   | 'rule-error'
   | 'syntax-error'
   | 'unknown-placeholder'
   | 'unknown-filter'
   | 'unknown-identifier';

export interface Diagnostic {
   /** Template-relative path; absent for manifest-level problems. */
   file?: string;
   /** 1-based. */
   line?: number;
   /** 1-based. */
   column?: number;
   message: string;
   severity: DiagnosticSeverity;
   code: DiagnosticCode;
}

export interface CheckOptions {
   manifestPath?: string;
}

/**
 * Statically check a template without resolving any values.
 *
 * Every renderable file and path segment is checked, whatever the
 * exclusion rules would remove for a given configuration.
 */
export async function checkTemplate(
   templateDir: string,
   options: CheckOptions = {},
): Promise<Diagnostic[]> {
   let loaded: Awaited<ReturnType<typeof loadTemplateManifest>>;
   try {
      loaded = await loadTemplateManifest(templateDir, {manifestPath: options.manifestPath});
   } catch (err) {
      if (err instanceof ManifestError) {
         return [{message: err.message, severity: 'error', code: 'manifest-error'}];
      }
      throw err;
   }

   const {manifest, manifestPath} = loaded;
   const diagnostics: Diagnostic[] = [];

   let schema: CompiledSchema | undefined;
   try {
      schema = compileSchema({options: manifest.options, derived: manifest.derived});
      compileRules(manifest.exclusions ?? [], schema.optionNames);
   } catch (err) {
      if (err instanceof SchemaError) {
         diagnostics.push({message: err.message, severity: 'error', code: 'schema-error'});
      } else if (err instanceof RuleError) {
         diagnostics.push({message: err.message, severity: 'error', code: 'rule-error'});
      } else {
         throw err;
      }
   }

   // Without a valid schema every name would look unknown.
   const names = schema
      ? {options: schema.optionNames, placeholders: schema.placeholderNames}
      : undefined;

   const tree = readTemplateTree(loaded.templateDir, {skip: manifestPath ? [manifestPath] : []});
   walk(tree, (node) => {
      checkText(node.name, node.path, manifest, names, diagnostics);
      if (node.type === 'file' && !isVerbatim(node.data, node.path, manifest)) {
         checkText(node.data.toString('utf8'), node.path, manifest, names, diagnostics);
      }
   });

   return diagnostics;
}

interface KnownNames {
   options: ReadonlySet<string>;
   placeholders: ReadonlySet<string>;
}

function checkText(
   text: string,
   file: string,
   manifest: TemplateManifest,
   names: KnownNames | undefined,
   out: Diagnostic[],
): void {
   let nodes: TemplateAstNode[];
   try {
      nodes = parseTemplate(text, {syntax: manifest.syntax, file});
   } catch (err) {
      if (err instanceof RenderError) {
         out.push({file, line: err.line, column: err.column, message: err.message, severity: 'error', code: 'syntax-error'});
         return;
      }
      if (err instanceof RuleError) {
         const {line, column} = locate(text, err.offset);
         out.push({file, line, column, message: err.message, severity: 'error', code: 'syntax-error'});
         return;
      }
      throw err;
   }

   for (const node of collectPlaceholders(nodes)) {
      const {line, column} = locate(text, node.offset);
      if (names && !names.placeholders.has(node.name)) {
         out.push({
            file, line, column,
            message: `"${node.name}" is not a declared option or derived placeholder`,
            severity: 'warning',
            code: 'unknown-placeholder',
         });
      }
      for (const filter of node.filters) {
         if (!isKnownFilter(filter)) {
            out.push({
               file, line, column,
               message: `Unknown filter "${filter}" in "${node.token}"`,
               severity: 'warning',
               code: 'unknown-filter',
            });
         }
      }
   }

   if (!names) return;
   for (const branch of collectConditions(nodes)) {
      for (const ident of identifierNodes(branch.condition)) {
         if (names.options.has(ident.name)) continue;
         const {line, column} = locate(text, branch.offset + ident.offset);
         out.push({
            file, line, column,
            message: `Condition "${branch.source}" names undeclared option "${ident.name}" (always absent)`,
            severity: 'warning',
            code: 'unknown-identifier',
         });
      }
   }
}

function isVerbatim(data: Buffer, file: string, manifest: TemplateManifest): boolean {
   return isBinary(data) || (manifest.copyWithoutRender ?? []).some((p) => minimatch(file, p, {dot: true}));
}

function walk(dir: TemplateDirectory, visit: (node: TemplateNode) => void): void {
   for (const child of dir.children) {
      visit(child);
      if (child.type === 'dir') walk(child, visit);
   }
}
