// src/schema/tree.ts

/**
 * A file in the template source tree.
 *
 * Paths are POSIX-style and relative to the template root.
 */
export interface TemplateFile {
   type: 'file';
   /** Last path segment as it appears on disk, e.g. "{{project-name}}.md". */
   name: string;
   /** Template-relative path, e.g. "src/{{project-name}}/lib.rs". */
   path: string;
   data: Buffer;
}

export interface TemplateDirectory {
   type: 'dir';
   name: string;
   /** Template-relative path; "" for the template root. */
   path: string;
   /** Children sorted by name. */
   children: TemplateNode[];
}

export type TemplateNode = TemplateFile | TemplateDirectory;

/**
 * One entry of a rendered output tree.
 */
export interface RenderedEntry {
   type: 'file' | 'dir';
   /** Output-relative POSIX path after placeholder substitution. */
   path: string;
   /** Template-relative path the entry was produced from. */
   sourcePath: string;
   /** File contents (files only). */
   data?: Buffer;
   /** Set when the file was copied byte for byte (binary or copyWithoutRender). */
   verbatim?: boolean;
}

/**
 * A condition-gated set of template paths removed from the output.
 */
export interface ExclusionRule {
   /** Expression over the resolved configuration, e.g. "bench == false". */
   when: string;
   /**
    * Template-relative paths. Plain paths exclude themselves and every
    * descendant; paths with glob characters are matched with minimatch.
    */
   paths: string[];
}
