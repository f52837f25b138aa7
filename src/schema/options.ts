// src/schema/options.ts

/**
 * Concrete value of a template option.
 */
export type OptionValue = boolean | string;

/**
 * Shape of the values an option accepts.
 *
 * - boolean: `true` / `false`
 * - string : any string, optionally constrained by `regex`
 * - enum   : one of `choices`
 */
export type OptionKind =
   | { type: 'boolean' }
   | { type: 'string' }
   | { type: 'enum'; choices: string[] };

/**
 * A single configurable template parameter.
 */
export interface OptionDefinition {
   /**
    * Unique key, referenced from placeholders and expressions.
    * Example: "project-name", "build_c_libs".
    */
   name: string;

   kind: OptionKind;

   /**
    * Value used when the caller supplies none.
    * If omitted, the option is required whenever it is active.
    */
   default?: OptionValue;

   /**
    * Regular expression source checked against string and enum values.
    */
   regex?: string;

   /**
    * Question shown in interactive mode. Defaults to the option name.
    */
   prompt?: string;

   /**
    * Activation condition. The option only exists in the resolved
    * configuration when this evaluates true.
    *
    * Example: "build_c_libs == true"
    */
   when?: string;
}

/**
 * A placeholder computed from another option through a filter,
 * e.g. `crate_name` as the snake_case form of `project-name`.
 */
export interface DerivedPlaceholder {
   name: string;
   from: string;
   transform: string;
}

/**
 * Values supplied by the caller (CLI defines, answers to prompts, matrix
 * entries). Strings given for boolean options are coerced.
 */
export type OptionOverrides = Readonly<Record<string, OptionValue>>;

/**
 * Final mapping of option name → value for one generation run.
 */
export type ResolvedConfiguration = ReadonlyMap<string, OptionValue>;
