// src/core/errors.ts

export type SchemaErrorCode =
   | 'MissingRequired'
   | 'InvalidValue'
   | 'CyclicDependency'
   | 'InvalidDefinition';

export type RuleErrorCode = 'MalformedExpression' | 'UnknownOption';

export type RenderErrorCode =
   | 'UnknownPlaceholder'
   | 'UnterminatedBlock'
   | 'UnterminatedTag'
   | 'UnexpectedTag'
   | 'UnknownFilter'
   | 'InvalidPath'
   | 'PathCollision';

/**
 * Configuration-time failure in the option schema or the supplied values.
 */
export class SchemaError extends Error {
   readonly code: SchemaErrorCode;
   readonly option: string | undefined;
   readonly reason: string | undefined;
   /** Options on the dependency cycle, in order (CyclicDependency only). */
   readonly cycle: readonly string[] | undefined;

   constructor(params: {
      code: SchemaErrorCode;
      message: string;
      option?: string;
      reason?: string;
      cycle?: readonly string[];
   }) {
      super(params.message);
      this.name = 'SchemaError';
      this.code = params.code;
      this.option = params.option;
      this.reason = params.reason;
      this.cycle = params.cycle;
   }

   static missingRequired(option: string): SchemaError {
      return new SchemaError({
         code: 'MissingRequired',
         option,
         message: `Option "${option}" is required but no value was supplied.`,
      });
   }

   static invalidValue(option: string, reason: string): SchemaError {
      return new SchemaError({
         code: 'InvalidValue',
         option,
         reason,
         message: `Invalid value for option "${option}": ${reason}`,
      });
   }

   static invalidDefinition(option: string, reason: string): SchemaError {
      return new SchemaError({
         code: 'InvalidDefinition',
         option,
         reason,
         message: `Invalid definition for "${option}": ${reason}`,
      });
   }

   static cyclicDependency(cycle: readonly string[]): SchemaError {
      return new SchemaError({
         code: 'CyclicDependency',
         cycle,
         option: cycle[0],
         message: `Activation conditions form a cycle: ${[...cycle, cycle[0]].join(' -> ')}`,
      });
   }
}

/**
 * A condition expression that cannot be parsed or names an unknown option.
 */
export class RuleError extends Error {
   readonly code: RuleErrorCode;
   /** Expression source text. */
   readonly expression: string;
   /** 0-based character offset into `expression` (or into `file` when set). */
   readonly offset: number;
   /**
    * Where the expression came from, e.g. `option "build_csharp_libs"`
    * or `exclusion rule #2`.
    */
   readonly origin: string | undefined;
   readonly file: string | undefined;
   /** Message without location suffix. */
   readonly detail: string;

   constructor(params: {
      code: RuleErrorCode;
      detail: string;
      expression: string;
      offset: number;
      origin?: string;
      file?: string;
   }) {
      const where = params.file
         ? ` in ${params.file}`
         : params.origin
            ? ` in ${params.origin}`
            : '';
      super(
         `${params.detail}${where} (at offset ${params.offset} of "${params.expression}")`,
      );
      this.name = 'RuleError';
      this.code = params.code;
      this.expression = params.expression;
      this.offset = params.offset;
      this.origin = params.origin;
      this.file = params.file;
      this.detail = params.detail;
   }

   /**
    * Copy of this error attributed to an origin or file, with the offset
    * shifted by `baseOffset`.
    */
   relocate(where: {origin?: string; file?: string}, baseOffset = 0): RuleError {
      return new RuleError({
         code: this.code,
         detail: this.detail,
         expression: this.expression,
         offset: this.offset + baseOffset,
         origin: where.origin ?? this.origin,
         file: where.file ?? this.file,
      });
   }
}

/**
 * Failure while rendering a template file or path.
 */
export class RenderError extends Error {
   readonly code: RenderErrorCode;
   /** Template-relative path of the file (or path) being rendered. */
   readonly file: string;
   /** 0-based character offset. */
   readonly offset: number;
   /** 1-based. */
   readonly line: number;
   /** 1-based. */
   readonly column: number;
   readonly token: string | undefined;

   constructor(params: {
      code: RenderErrorCode;
      detail: string;
      file: string;
      text: string;
      offset: number;
      token?: string;
   }) {
      const {line, column} = locate(params.text, params.offset);
      super(`${params.detail} (${params.file}:${line}:${column})`);
      this.name = 'RenderError';
      this.code = params.code;
      this.file = params.file;
      this.offset = params.offset;
      this.line = line;
      this.column = column;
      this.token = params.token;
   }
}

/**
 * Filesystem failure while reading the template or writing the output.
 */
export class IoError extends Error {
   /** "OutputExists" or the errno code, e.g. "EACCES", "ENOSPC". */
   readonly code: string;
   readonly path: string;

   constructor(code: string, filePath: string, message: string, cause?: unknown) {
      super(message, {cause});
      this.name = 'IoError';
      this.code = code;
      this.path = filePath;
   }

   static wrap(err: unknown, filePath: string, action: string): IoError {
      if (err instanceof IoError) return err;
      const code = errnoCode(err) ?? 'EIO';
      const detail = err instanceof Error ? err.message : String(err);
      return new IoError(code, filePath, `Failed to ${action} "${filePath}": ${detail}`, err);
   }
}

/**
 * A manifest file that cannot be read or does not have the expected shape.
 */
export class ManifestError extends Error {
   readonly file: string;
   readonly field: string | undefined;

   constructor(file: string, message: string, field?: string, cause?: unknown) {
      super(field ? `${file}: '${field}' ${message}` : `${file}: ${message}`, {cause});
      this.name = 'ManifestError';
      this.file = file;
      this.field = field;
   }
}

export type TemplateForgeError =
   | SchemaError
   | RuleError
   | RenderError
   | IoError
   | ManifestError;

export function isTemplateForgeError(err: unknown): err is TemplateForgeError {
   return (
      err instanceof SchemaError ||
      err instanceof RuleError ||
      err instanceof RenderError ||
      err instanceof IoError ||
      err instanceof ManifestError
   );
}

/**
 * 1-based line/column of a character offset.
 */
export function locate(text: string, offset: number): {line: number; column: number} {
   let line = 1;
   let lineStart = 0;
   const end = Math.min(offset, text.length);
   for (let i = 0; i < end; i++) {
      if (text[i] === '\n') {
         line += 1;
         lineStart = i + 1;
      }
   }
   return {line, column: end - lineStart + 1};
}

function errnoCode(err: unknown): string | undefined {
   if (typeof err === 'object' && err !== null && 'code' in err) {
      const code = err.code;
      return typeof code === 'string' ? code : undefined;
   }
   return undefined;
}
