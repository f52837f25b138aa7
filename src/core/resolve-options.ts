// src/core/resolve-options.ts

import {IDENTIFIER_PATTERN, referencedIdentifiers, type Expr} from '../ast/expression';
import type {
   DerivedPlaceholder,
   OptionDefinition,
   OptionOverrides,
   OptionValue,
   ResolvedConfiguration,
} from '../schema';
import {SchemaError} from './errors';
import {getFilter} from './filters';
import {compileExpression, evaluate} from './rule-engine';

/**
 * Options plus the placeholders derived from them.
 */
export interface OptionSchema {
   options: readonly OptionDefinition[];
   derived?: readonly DerivedPlaceholder[];
}

export interface CompiledOption {
   option: OptionDefinition;
   /** Parsed activation condition; undefined when always active. */
   condition: Expr | undefined;
   /** Other options referenced by the condition. */
   dependencies: string[];
}

export interface CompiledSchema {
   /** Options in resolution (topological) order. */
   order: CompiledOption[];
   derived: DerivedPlaceholder[];
   /** Declared option names. */
   optionNames: ReadonlySet<string>;
   /** Option names plus derived placeholder names. */
   placeholderNames: ReadonlySet<string>;
}

/**
 * Validate the schema and compute the resolution order.
 *
 * Throws SchemaError (InvalidDefinition, CyclicDependency) or RuleError
 * (MalformedExpression, UnknownOption) before any value is resolved.
 */
export function compileSchema(schema: OptionSchema): CompiledSchema {
   const optionNames = new Set<string>();

   for (const option of schema.options) {
      if (!IDENTIFIER_PATTERN.test(option.name)) {
         throw SchemaError.invalidDefinition(
            option.name,
            `name must match ${IDENTIFIER_PATTERN.source}`,
         );
      }
      if (optionNames.has(option.name)) {
         throw SchemaError.invalidDefinition(option.name, 'declared more than once');
      }
      optionNames.add(option.name);
      checkDefinition(option);
   }

   const compiled = schema.options.map((option): CompiledOption => {
      if (option.when === undefined) {
         return {option, condition: undefined, dependencies: []};
      }
      const condition = compileExpression(option.when, optionNames, `option "${option.name}"`);
      return {option, condition, dependencies: referencedIdentifiers(condition)};
   });

   const derived = [...(schema.derived ?? [])];
   const placeholderNames = new Set(optionNames);
   for (const d of derived) {
      if (!IDENTIFIER_PATTERN.test(d.name)) {
         throw SchemaError.invalidDefinition(d.name, `name must match ${IDENTIFIER_PATTERN.source}`);
      }
      if (placeholderNames.has(d.name)) {
         throw SchemaError.invalidDefinition(d.name, 'collides with another option or derived placeholder');
      }
      if (!optionNames.has(d.from)) {
         throw SchemaError.invalidDefinition(d.name, `derives from unknown option "${d.from}"`);
      }
      if (!getFilter(d.transform)) {
         throw SchemaError.invalidDefinition(d.name, `unknown transform "${d.transform}"`);
      }
      placeholderNames.add(d.name);
   }

   return {
      order: topologicalOrder(compiled),
      derived,
      optionNames,
      placeholderNames,
   };
}

/**
 * Resolution order of the options: every option comes after the options
 * its activation condition references. Ties keep declaration order.
 */
export function orderOptions(options: readonly OptionDefinition[]): OptionDefinition[] {
   return compileSchema({options}).order.map((c) => c.option);
}

/**
 * Resolve the final configuration from the schema and caller overrides.
 *
 * - Options are visited in topological order.
 * - An option whose activation condition is false is omitted, even when
 *   an override names it.
 * - An active option takes its override, else its default, else fails
 *   with MissingRequired.
 * - Values are checked against kind, choices and regex (InvalidValue).
 * - Derived placeholders are added for every present base option.
 */
export function resolveOptions(
   schema: OptionSchema | CompiledSchema,
   overrides: OptionOverrides = {},
): ResolvedConfiguration {
   const compiled = 'order' in schema ? schema : compileSchema(schema);
   const values = new Map<string, OptionValue>();

   for (const {option, condition} of compiled.order) {
      if (condition && !evaluate(condition, values)) continue;

      const supplied = Object.hasOwn(overrides, option.name) ? overrides[option.name] : undefined;
      const raw = supplied ?? option.default;
      if (raw === undefined) {
         throw SchemaError.missingRequired(option.name);
      }

      const value = coerceValue(option, raw);
      const reason = checkValue(option, value);
      if (reason) {
         throw SchemaError.invalidValue(option.name, reason);
      }

      values.set(option.name, value);
   }

   for (const d of compiled.derived) {
      const base = values.get(d.from);
      if (base === undefined) continue;
      const transform = getFilter(d.transform);
      if (!transform) {
         throw SchemaError.invalidDefinition(d.name, `unknown transform "${d.transform}"`);
      }
      values.set(d.name, transform(String(base)));
   }

   return values;
}

/**
 * Override keys that did not end up in the resolved configuration,
 * either because no such option exists or because it was inactive.
 */
export function unusedOverrides(
   overrides: OptionOverrides,
   resolved: ResolvedConfiguration,
): string[] {
   return Object.keys(overrides).filter((key) => !resolved.has(key));
}

/**
 * Strings "true"/"false" (any case) become booleans for boolean options;
 * everything else is returned unchanged.
 */
export function coerceValue(option: OptionDefinition, value: OptionValue): OptionValue {
   if (option.kind.type !== 'boolean' || typeof value !== 'string') return value;
   const lowered = value.trim().toLowerCase();
   if (lowered === 'true') return true;
   if (lowered === 'false') return false;
   return value;
}

/**
 * Reason the value is unacceptable for the option, or null.
 */
export function checkValue(option: OptionDefinition, value: OptionValue): string | null {
   const {kind} = option;

   if (kind.type === 'boolean') {
      return typeof value === 'boolean'
         ? null
         : `expected a boolean, got string "${value}"`;
   }

   if (typeof value !== 'string') {
      return `expected a string, got boolean ${String(value)}`;
   }

   if (kind.type === 'enum' && !kind.choices.includes(value)) {
      return `"${value}" is not one of: ${kind.choices.join(', ')}`;
   }

   if (option.regex !== undefined && !new RegExp(option.regex).test(value)) {
      return `"${value}" does not match /${option.regex}/`;
   }

   return null;
}

// ---------------------------------------------------------------------------
// Internal
// ---------------------------------------------------------------------------

function checkDefinition(option: OptionDefinition): void {
   const {kind} = option;

   if (kind.type === 'enum' && kind.choices.length === 0) {
      throw SchemaError.invalidDefinition(option.name, 'enum option has no choices');
   }

   if (option.regex !== undefined) {
      if (kind.type === 'boolean') {
         throw SchemaError.invalidDefinition(option.name, 'regex is not allowed on boolean options');
      }
      try {
         new RegExp(option.regex);
      } catch (err) {
         const detail = err instanceof Error ? err.message : String(err);
         throw SchemaError.invalidDefinition(option.name, `regex does not compile: ${detail}`);
      }
   }

   if (option.default !== undefined) {
      const reason = checkValue(option, option.default);
      if (reason) {
         throw SchemaError.invalidDefinition(option.name, `default ${reason}`);
      }
   }
}

function topologicalOrder(compiled: CompiledOption[]): CompiledOption[] {
   const placed = new Set<string>();
   const remaining = [...compiled];
   const order: CompiledOption[] = [];

   while (remaining.length > 0) {
      const idx = remaining.findIndex((c) => c.dependencies.every((d) => placed.has(d)));
      if (idx === -1) {
         throw SchemaError.cyclicDependency(findCycle(remaining));
      }
      const [next] = remaining.splice(idx, 1);
      order.push(next);
      placed.add(next.option.name);
   }

   return order;
}

/**
 * Every remaining option depends on at least one other remaining option,
 * so following first remaining dependencies must revisit a node.
 */
function findCycle(remaining: CompiledOption[]): string[] {
   const byName = new Map(remaining.map((c) => [c.option.name, c]));
   const path: string[] = [];
   let current: CompiledOption | undefined = remaining[0];

   while (current) {
      const name = current.option.name;
      const seenAt = path.indexOf(name);
      if (seenAt !== -1) return path.slice(seenAt);
      path.push(name);
      const nextName: string | undefined = current.dependencies.find((d) => byName.has(d));
      current = nextName === undefined ? undefined : byName.get(nextName);
   }

   return path;
}
