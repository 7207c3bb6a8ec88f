/**
 * Loading of the Hugging Face tokenizer export.
 *
 * A tokenizer directory holds two documents:
 * - `tokenizer_config.json`: preprocessing options, including `unk_token`
 * - `tokenizer.json`: the model (`model.vocab`) and `added_tokens`
 *
 * Both are validated with zod. Validation failures become SchemaErrors that
 * name the file and the dotted field path, and tell a missing field apart
 * from one holding the wrong type.
 */

import { readFile } from 'fs/promises';
import { join } from 'path';
import { z } from 'zod';
import { IOError, ParseError, SchemaError } from '../errors.js';
import type { AddedToken } from '../vocab/assembler.js';

export const TOKENIZER_CONFIG_FILE = 'tokenizer_config.json';
export const TOKENIZER_FILE = 'tokenizer.json';

/**
 * `unk_token` is either a plain string or a serialized AddedToken.
 */
const UnkTokenSchema = z.union([
  z.string(),
  z.object({ content: z.string() }).passthrough(),
]);

export const TokenizerConfigSchema = z
  .object({
    unk_token: UnkTokenSchema,
  })
  .passthrough();

export const AddedTokenSchema = z.object({
  content: z.string(),
  normalized: z.boolean(),
});

const VocabIdSchema = z.number().int().nonnegative();

export const TokenizerSchema = z
  .object({
    model: z
      .object({
        type: z.string().optional(),
        vocab: z.record(VocabIdSchema),
      })
      .passthrough(),
    added_tokens: z.array(AddedTokenSchema).nullish(),
  })
  .passthrough();

/**
 * Everything the converter reads from the two documents.
 */
export interface TokenizerDocuments {
  /** Token marked UNKNOWN in the output */
  unkToken: string;

  /** `model.vocab`: token → id */
  vocab: Record<string, number>;

  /** `added_tokens`, in file order */
  addedTokens: AddedToken[];

  /** `model.type`, when present */
  modelType?: string;
}

function valueAt(document: unknown, path: ReadonlyArray<string | number>): unknown {
  let current: unknown = document;
  for (const key of path) {
    if (typeof current !== 'object' || current === null) {
      return undefined;
    }
    current = Reflect.get(current, key);
  }
  return current;
}

function toSchemaError(
  file: string,
  document: unknown,
  error: z.ZodError,
  basePath: ReadonlyArray<string | number> = []
): SchemaError {
  const issue = error.issues[0];
  const path = [...basePath, ...issue.path];
  const field = path.length > 0 ? path.join('.') : '(root)';

  if (valueAt(document, path) === undefined) {
    return new SchemaError(`missing field "${field}"`, { file, field }, { cause: error });
  }
  return new SchemaError(`field "${field}" is invalid: ${issue.message}`, { file, field }, {
    cause: error,
  });
}

/**
 * Validate a parsed `tokenizer_config.json`.
 */
export function parseTokenizerConfig(document: unknown): { unkToken: string } {
  const result = TokenizerConfigSchema.safeParse(document);
  if (!result.success) {
    throw toSchemaError(TOKENIZER_CONFIG_FILE, document, result.error);
  }

  const unk = result.data.unk_token;
  return { unkToken: typeof unk === 'string' ? unk : unk.content };
}

/**
 * Copy `model.vocab` from the parsed document. zod's record parser drops an
 * own `__proto__` key, so entries are taken from the raw object and each id
 * is checked here.
 */
function readVocab(document: unknown): Record<string, number> {
  const raw = valueAt(document, ['model', 'vocab']);
  if (typeof raw !== 'object' || raw === null) {
    return {};
  }

  const entries: Array<[string, number]> = [];
  for (const [token, value] of Object.entries(raw)) {
    const id: unknown = value;
    const result = VocabIdSchema.safeParse(id);
    if (!result.success) {
      throw toSchemaError(TOKENIZER_FILE, document, result.error, ['model', 'vocab', token]);
    }
    entries.push([token, result.data]);
  }
  return Object.fromEntries(entries);
}

/**
 * Validate a parsed `tokenizer.json`.
 */
export function parseTokenizer(
  document: unknown
): Pick<TokenizerDocuments, 'vocab' | 'addedTokens' | 'modelType'> {
  const result = TokenizerSchema.safeParse(document);
  if (!result.success) {
    throw toSchemaError(TOKENIZER_FILE, document, result.error);
  }

  return {
    vocab: readVocab(document),
    addedTokens: result.data.added_tokens ?? [],
    modelType: result.data.model.type,
  };
}

/**
 * Read and parse one JSON document.
 *
 * @throws IOError if the file cannot be read
 * @throws ParseError if it is not valid JSON
 */
export async function readJsonDocument(path: string, file: string = path): Promise<unknown> {
  let text: string;
  try {
    text = await readFile(path, 'utf-8');
  } catch (error) {
    throw new IOError(path, `Cannot read ${file}`, { cause: error });
  }

  try {
    const document: unknown = JSON.parse(text);
    return document;
  } catch (error) {
    throw new ParseError(file, error instanceof Error ? error.message : String(error), {
      cause: error,
    });
  }
}

/**
 * Load both documents from a tokenizer directory, config first.
 */
export async function loadTokenizerDocuments(directory: string): Promise<TokenizerDocuments> {
  const config = parseTokenizerConfig(
    await readJsonDocument(join(directory, TOKENIZER_CONFIG_FILE), TOKENIZER_CONFIG_FILE)
  );
  const tokenizer = parseTokenizer(
    await readJsonDocument(join(directory, TOKENIZER_FILE), TOKENIZER_FILE)
  );

  return { ...config, ...tokenizer };
}
