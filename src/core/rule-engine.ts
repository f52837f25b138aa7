// src/core/rule-engine.ts

import {minimatch} from 'minimatch';
import {identifierNodes, parseExpression, type Expr} from '../ast/expression';
import type {ExclusionRule, OptionValue, ResolvedConfiguration} from '../schema';
import {toPosixPath} from '../util/fs-utils';
import {RuleError} from './errors';

/**
 * An exclusion rule whose expression has been parsed and checked.
 */
export interface CompiledRule {
   source: string;
   expr: Expr;
   paths: string[];
}

/**
 * Normalised exclusion patterns (no leading "./" or trailing "/").
 */
export type ExclusionSet = ReadonlySet<string>;

/** Result of evaluating an operand; `undefined` means "absent". */
type Operand = OptionValue | undefined;

/**
 * Evaluate a condition against the resolved configuration.
 *
 * Absent-is-false: a bare reference to an absent option is false, and any
 * comparison with an absent option is false for both `==` and `!=`.
 * `!` and the logical operators then apply to those results as usual.
 */
export function evaluate(expr: Expr, values: ResolvedConfiguration): boolean {
   switch (expr.type) {
      case 'literal':
         return truthy(expr.value);
      case 'ident':
         return truthy(values.get(expr.name));
      case 'not':
         return !evaluate(expr.operand, values);
      case 'logical':
         return expr.op === 'and'
            ? evaluate(expr.left, values) && evaluate(expr.right, values)
            : evaluate(expr.left, values) || evaluate(expr.right, values);
      case 'compare': {
         const left = operand(expr.left, values);
         const right = operand(expr.right, values);
         if (left === undefined || right === undefined) return false;
         const equal = typeof left === typeof right && left === right;
         return expr.op === '==' ? equal : !equal;
      }
   }
}

/**
 * Parse and evaluate in one step.
 */
export function evaluateSource(source: string, values: ResolvedConfiguration): boolean {
   return evaluate(parseExpression(source), values);
}

/**
 * Parse an expression and check that it only names known identifiers.
 *
 * @param origin - used in error messages, e.g. `exclusion rule #1`.
 */
export function compileExpression(
   source: string,
   knownNames: ReadonlySet<string>,
   origin: string,
): Expr {
   let expr: Expr;
   try {
      expr = parseExpression(source);
   } catch (err) {
      if (err instanceof RuleError) throw err.relocate({origin});
      throw err;
   }

   for (const ident of identifierNodes(expr)) {
      if (!knownNames.has(ident.name)) {
         throw new RuleError({
            code: 'UnknownOption',
            detail: `Unknown option "${ident.name}"`,
            expression: source,
            offset: ident.offset,
            origin,
         });
      }
   }

   return expr;
}

/**
 * Fail-fast pre-pass over the whole rule set.
 */
export function compileRules(
   rules: readonly ExclusionRule[],
   knownNames: ReadonlySet<string>,
): CompiledRule[] {
   return rules.map((rule, index) => ({
      source: rule.when,
      expr: compileExpression(rule.when, knownNames, `exclusion rule #${index + 1} ("${rule.when}")`),
      paths: rule.paths.map(normalizePattern).filter(Boolean),
   }));
}

/**
 * Union of the path patterns of every rule whose condition holds.
 */
export function computeExclusions(
   rules: readonly CompiledRule[],
   values: ResolvedConfiguration,
): ExclusionSet {
   const out = new Set<string>();
   for (const rule of rules) {
      if (!evaluate(rule.expr, values)) continue;
      for (const p of rule.paths) out.add(p);
   }
   return out;
}

/**
 * A path is excluded when it, or any of its ancestors, matches a pattern.
 * Plain patterns match by equality; glob patterns through minimatch.
 */
export function isPathExcluded(filePath: string, exclusions: ExclusionSet): boolean {
   if (exclusions.size === 0) return false;

   const target = normalizePattern(filePath);
   if (!target) return false;

   const candidates = ancestorsAndSelf(target);

   for (const pattern of exclusions) {
      if (isGlob(pattern)) {
         if (candidates.some((c) => minimatch(c, pattern, {dot: true}))) return true;
      } else if (candidates.includes(pattern)) {
         return true;
      }
   }

   return false;
}

export function normalizePattern(p: string): string {
   return toPosixPath(p.trim())
      .replace(/^(\.\/)+/, '')
      .replace(/^\/+/, '')
      .replace(/\/+$/, '');
}

function ancestorsAndSelf(p: string): string[] {
   const parts = p.split('/');
   const out: string[] = [];
   for (let i = 1; i <= parts.length; i++) {
      out.push(parts.slice(0, i).join('/'));
   }
   return out;
}

function isGlob(pattern: string): boolean {
   // "{{name}}" segments are template placeholders, not brace expansions.
   return /[*?[\]{}]/.test(pattern.replace(/\{\{[^{}]*\}\}/g, ''));
}

function truthy(value: Operand): boolean {
   if (value === undefined) return false;
   if (typeof value === 'boolean') return value;
   return value.length > 0;
}

function operand(expr: Expr, values: ResolvedConfiguration): Operand {
   if (expr.type === 'ident') return values.get(expr.name);
   if (expr.type === 'literal') return expr.value;
   return evaluate(expr, values);
}
