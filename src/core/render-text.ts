// src/core/render-text.ts

import {parseTemplate, type TemplateAstNode} from '../ast/template';
import type {ResolvedConfiguration, TemplateSyntax} from '../schema';
import {RenderError} from './errors';
import {getFilter} from './filters';
import {evaluate} from './rule-engine';

export interface RenderContext {
   values: ResolvedConfiguration;
   syntax?: Partial<TemplateSyntax>;
}

/**
 * Render one template text.
 *
 * Only the kept branch of each conditional block is visited, so unknown
 * placeholders in discarded branches never fail.
 *
 * @param file - template-relative path used in errors.
 */
export function renderText(text: string, ctx: RenderContext, file = '<inline>'): string {
   const nodes = parseTemplate(text, {syntax: ctx.syntax, file});
   const out: string[] = [];
   emit(nodes, ctx.values, out, text, file);
   return out.join('');
}

function emit(
   nodes: TemplateAstNode[],
   values: ResolvedConfiguration,
   out: string[],
   text: string,
   file: string,
): void {
   for (const node of nodes) {
      switch (node.type) {
         case 'text':
            out.push(node.value);
            break;

         case 'placeholder':
            out.push(substitute(node.name, node.filters, node.token, node.offset, values, text, file));
            break;

         case 'if': {
            const kept = node.branches.find((b) => evaluate(b.condition, values));
            const body = kept ? kept.body : node.elseBody;
            if (body) emit(body, values, out, text, file);
            break;
         }
      }
   }
}

function substitute(
   name: string,
   filters: string[],
   token: string,
   offset: number,
   values: ResolvedConfiguration,
   text: string,
   file: string,
): string {
   const value = values.get(name);
   if (value === undefined) {
      throw new RenderError({
         code: 'UnknownPlaceholder',
         detail: `Unknown placeholder "${token}"`,
         file,
         text,
         offset,
         token,
      });
   }

   let result = String(value);
   for (const filterName of filters) {
      const fn = getFilter(filterName);
      if (!fn) {
         throw new RenderError({
            code: 'UnknownFilter',
            detail: `Unknown filter "${filterName}" in "${token}"`,
            file,
            text,
            offset,
            token: filterName,
         });
      }
      result = fn(result);
   }
   return result;
}
