// src/core/init-template.ts

import fs from 'fs';
import path from 'path';
import {writeFileEnsuringDirSync} from '../util/fs-utils';
import {defaultLogger} from '../util/logger';
import {IoError} from './errors';

const logger = defaultLogger.child('[init]');

export interface InitTemplateOptions {
   /**
    * Overwrite starter files that already exist.
    */
   force?: boolean;
}

export interface InitTemplateResult {
   templateDir: string;
   /** Absolute paths written. */
   written: string[];
}

// ---------------------------------------------------------------------------
// Starter template files
// ---------------------------------------------------------------------------

const DEFAULT_MANIFEST_TOML = `# template.toml
# Options are asked for (or passed with -D key=value) before rendering.

[template]
name = "starter"
description = "A minimal starter template"
# Paths removed from every generated project.
# exclude = ["notes.md"]
# Files copied byte for byte.
# copy_without_render = ["**/*.png"]

[placeholders.project-name]
type = "string"
prompt = "Project name"
regex = "^[a-z][a-z0-9-]*$"
default = "my-project"

[placeholders.license]
type = "string"
prompt = "License"
choices = ["MIT", "Apache-2.0"]
default = "MIT"

[placeholders.docs]
type = "bool"
prompt = "Include a docs/ section?"
default = false

# Only asked when docs is enabled.
[conditional.'docs == true'.placeholders]
docs-title = { type = "string", prompt = "Docs title", default = "Documentation" }

[conditional.'docs == false']
ignore = ["docs"]

[derived.package-name]
from = "project-name"
transform = "snake_case"
`;

const DEFAULT_README = `# {{ project-name | title_case }}

Package: \`{{ package-name }}\`, licensed under {{ license }}.
{%- if docs %}
See the {{ docs-title }} in \`docs/\`.
{%- endif %}
`;

const DEFAULT_INDEX = `{{ project-name }} starts here.
`;

const DEFAULT_DOCS = `# {{ docs-title }}
`;

const STARTER_FILES: ReadonlyArray<[relPath: string, contents: string]> = [
   ['template.toml', DEFAULT_MANIFEST_TOML],
   ['README.md.liquid', DEFAULT_README],
   ['src/{{project-name}}/index.txt', DEFAULT_INDEX],
   ['docs/index.md', DEFAULT_DOCS],
];

/**
 * Write a starter template into `dir`.
 *
 * Refuses to touch an existing starter file unless `force` is set; in
 * that case nothing at all is written.
 */
export async function initTemplate(
   dir: string,
   options: InitTemplateOptions = {},
): Promise<InitTemplateResult> {
   const templateDir = path.resolve(dir);
   const targets = STARTER_FILES.map(([rel, contents]) => ({
      abs: path.join(templateDir, rel),
      contents,
   }));

   if (!options.force) {
      const existing = targets.find((t) => fs.existsSync(t.abs));
      if (existing) {
         throw new IoError(
            'OutputExists',
            existing.abs,
            `${existing.abs} already exists (use --force to overwrite).`,
         );
      }
   }

   const written: string[] = [];
   for (const target of targets) {
      const existed = fs.existsSync(target.abs);
      try {
         writeFileEnsuringDirSync(target.abs, target.contents);
      } catch (err) {
         throw IoError.wrap(err, target.abs, 'write');
      }
      written.push(target.abs);
      logger.info(`${existed ? 'Overwrote' : 'Created'} ${target.abs}`);
   }

   return {templateDir, written};
}
