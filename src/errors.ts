/**
 * Error types raised by the converter.
 *
 * Every failure surfaces as a {@link ConversionError}; the `kind` field tells
 * callers which pipeline stage rejected the input without `instanceof` chains.
 */

export type ConversionErrorKind = 'io' | 'parse' | 'schema' | 'compile';

/**
 * Base class for all conversion failures.
 */
export class ConversionError extends Error {
  readonly kind: ConversionErrorKind;

  constructor(kind: ConversionErrorKind, message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = 'ConversionError';
    this.kind = kind;
  }
}

/**
 * An input file could not be read or the output could not be written.
 */
export class IOError extends ConversionError {
  readonly path: string;

  constructor(path: string, message: string, options?: ErrorOptions) {
    super('io', `${message}: ${path}`, options);
    this.name = 'IOError';
    this.path = path;
  }
}

/**
 * An input document is not well-formed JSON.
 */
export class ParseError extends ConversionError {
  readonly file: string;

  constructor(file: string, message: string, options?: ErrorOptions) {
    super('parse', `Failed to parse ${file}: ${message}`, options);
    this.name = 'ParseError';
    this.file = file;
  }
}

/**
 * A document is well-formed but a required field is missing, has the wrong
 * type, or the vocabulary ids are not exactly `[0, N)`.
 */
export class SchemaError extends ConversionError {
  readonly file?: string;
  readonly field?: string;

  constructor(
    message: string,
    context: { file?: string; field?: string } = {},
    options?: ErrorOptions
  ) {
    super('schema', context.file ? `${context.file}: ${message}` : message, options);
    this.name = 'SchemaError';
    this.file = context.file;
    this.field = context.field;
  }
}

/**
 * The charsmap compiler rejected a table. The remap table is a bijection, so
 * seeing this during a conversion is an internal error.
 */
export class CompileError extends ConversionError {
  constructor(message: string, options?: ErrorOptions) {
    super('compile', `Internal error while compiling charsmap: ${message}`, options);
    this.name = 'CompileError';
  }
}

/**
 * Narrow an unknown thrown value to a {@link ConversionError}.
 */
export function isConversionError(error: unknown): error is ConversionError {
  return error instanceof ConversionError;
}
