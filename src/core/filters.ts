// src/core/filters.ts

import pluralize from 'pluralize';

export type FilterFn = (input: string) => string;

/**
 * Split an identifier-ish string into words on separators and case
 * boundaries: "myLib-name" → ["my", "Lib", "name"], "HTTPServer" → ["HTTP", "Server"].
 */
export function splitWords(input: string): string[] {
   return input
      .replace(/([a-z0-9])([A-Z])/g, '$1 $2')
      .replace(/([A-Z]+)([A-Z][a-z])/g, '$1 $2')
      .split(/[^A-Za-z0-9]+/)
      .filter(Boolean);
}

function capitalizeWord(word: string): string {
   return word.charAt(0).toUpperCase() + word.slice(1).toLowerCase();
}

const kebab: FilterFn = (s) => splitWords(s).map((w) => w.toLowerCase()).join('-');
const snake: FilterFn = (s) => splitWords(s).map((w) => w.toLowerCase()).join('_');
const pascal: FilterFn = (s) => splitWords(s).map(capitalizeWord).join('');
const camel: FilterFn = (s) =>
   splitWords(s)
      .map((w, i) => (i === 0 ? w.toLowerCase() : capitalizeWord(w)))
      .join('');
const lower: FilterFn = (s) => s.toLowerCase();
const upper: FilterFn = (s) => s.toUpperCase();

const FILTERS = new Map<string, FilterFn>([
   ['kebab_case', kebab],
   ['snake_case', snake],
   ['shouty_snake_case', (s) => snake(s).toUpperCase()],
   ['shouty_kebab_case', (s) => kebab(s).toUpperCase()],
   ['pascal_case', pascal],
   ['upper_camel_case', pascal],
   ['camel_case', camel],
   ['lower_camel_case', camel],
   ['title_case', (s) => splitWords(s).map(capitalizeWord).join(' ')],
   ['lower_case', lower],
   ['downcase', lower],
   ['upper_case', upper],
   ['upcase', upper],
   ['capitalize', (s) => s.charAt(0).toUpperCase() + s.slice(1)],
   ['plural', (s) => pluralize.plural(s)],
   ['singular', (s) => pluralize.singular(s)],
]);

export function getFilter(name: string): FilterFn | undefined {
   return FILTERS.get(name);
}

export function isKnownFilter(name: string): boolean {
   return FILTERS.has(name);
}

export function filterNames(): string[] {
   return [...FILTERS.keys()];
}
