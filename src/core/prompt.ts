// src/core/prompt.ts

import type {OptionDefinition, OptionOverrides, OptionValue} from '../schema';
import {SchemaError} from './errors';
import type {CompiledSchema} from './resolve-options';
import {checkValue, coerceValue} from './resolve-options';
import {evaluate} from './rule-engine';

export interface PromptQuestion {
   option: OptionDefinition;
   /** `option.prompt`, or the option name. */
   message: string;
   default: OptionValue | undefined;
   /** Enum choices, if any. */
   choices: readonly string[] | undefined;
   /** 1-based attempt counter; > 1 after an invalid answer. */
   attempt: number;
}

/**
 * Ask a single question; resolves to the raw answer text.
 */
export type AskFn = (question: PromptQuestion) => Promise<string>;

const MAX_ATTEMPTS = 3;

const YES = new Set(['y', 'yes', 'true']);
const NO = new Set(['n', 'no', 'false']);

/**
 * Ask for every active option the overrides leave open, in resolution
 * order. Activation is evaluated against the values gathered so far, so
 * an option gated on an earlier answer is only asked when that answer
 * enables it.
 *
 * @returns the overrides merged with the answers.
 */
export async function collectAnswers(
   compiled: CompiledSchema,
   overrides: OptionOverrides,
   ask: AskFn,
): Promise<Record<string, OptionValue>> {
   const answers: Record<string, OptionValue> = {...overrides};
   const known = new Map<string, OptionValue>();

   for (const {option, condition} of compiled.order) {
      if (condition && !evaluate(condition, known)) continue;

      if (Object.hasOwn(overrides, option.name)) {
         known.set(option.name, coerceValue(option, overrides[option.name]));
         continue;
      }

      const value = await askOption(option, ask);
      if (value === undefined) continue;
      answers[option.name] = value;
      known.set(option.name, value);
   }

   return answers;
}

/**
 * Interpret an answer for an option. Empty answers yield the default;
 * booleans accept y/yes/true and n/no/false in any case.
 */
export function parseAnswer(option: OptionDefinition, raw: string): OptionValue | undefined {
   const text = raw.trim();
   if (text === '') return option.default;

   if (option.kind.type === 'boolean') {
      const lowered = text.toLowerCase();
      if (YES.has(lowered)) return true;
      if (NO.has(lowered)) return false;
   }
   return text;
}

async function askOption(option: OptionDefinition, ask: AskFn): Promise<OptionValue | undefined> {
   let reason = '';
   for (let attempt = 1; attempt <= MAX_ATTEMPTS; attempt++) {
      const raw = await ask({
         option,
         message: option.prompt ?? option.name,
         default: option.default,
         choices: option.kind.type === 'enum' ? option.kind.choices : undefined,
         attempt,
      });

      const value = parseAnswer(option, raw);
      // No answer and no default: left for resolveOptions to report.
      if (value === undefined) return undefined;

      const problem = checkValue(option, value);
      if (!problem) return value;
      reason = problem;
   }
   throw SchemaError.invalidValue(option.name, reason);
}
