// src/schema/config.ts

import type {TemplateHooks} from './hooks';
import type {DerivedPlaceholder, OptionDefinition} from './options';
import type {ExclusionRule} from './tree';

/**
 * Delimiters recognised by the renderer.
 */
export interface TemplateSyntax {
   /** Default: "{{" */
   placeholderStart: string;
   /** Default: "}}" */
   placeholderEnd: string;
   /** Default: "{%" */
   blockStart: string;
   /** Default: "%}" */
   blockEnd: string;
}

export const DEFAULT_SYNTAX: Readonly<TemplateSyntax> = {
   placeholderStart: '{{',
   placeholderEnd: '}}',
   blockStart: '{%',
   blockEnd: '%}',
};

/**
 * Root manifest of a template.
 *
 * This is what a `template.config.ts` exports, or what `template.toml`
 * is converted into.
 */
export interface TemplateManifest {
   /**
    * Human-readable template name, used for logging only.
    */
   name?: string;

   description?: string;

   /**
    * Declared options, in prompt order. Resolution order additionally
    * respects activation dependencies.
    */
   options: OptionDefinition[];

   /**
    * Condition-gated exclusions. Unconditional excludes use `when: "true"`.
    */
   exclusions?: ExclusionRule[];

   /**
    * Placeholders computed from other options.
    */
   derived?: DerivedPlaceholder[];

   /**
    * Delimiter overrides; unspecified delimiters keep their defaults.
    */
   syntax?: Partial<TemplateSyntax>;

   /**
    * Glob patterns (template-relative) for files copied byte for byte.
    *
    * Example: ["**\/*.png", ".github/workflows/**"]
    */
   copyWithoutRender?: string[];

   /**
    * Only available in code manifests.
    */
   hooks?: TemplateHooks;
}

/**
 * Manifest file names looked up in the template root, in order.
 */
export const MANIFEST_FILE_NAMES = [
   'template.config.ts',
   'template.config.mts',
   'template.config.mjs',
   'template.config.js',
   'template.config.cjs',
   'template.toml',
] as const;

/**
 * File name suffix stripped from rendered file names.
 */
export const TEMPLATE_FILE_SUFFIX = '.liquid';

/**
 * Identity helper for typed code manifests.
 */
export function defineTemplate(manifest: TemplateManifest): TemplateManifest {
   return manifest;
}
