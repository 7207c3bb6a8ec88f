/**
 * SentencePiece `ModelProto` wire format.
 *
 * The schema is read from `proto/sentencepiece_model.proto` at run time and
 * encoded with protobufjs. Fields are written in field-number order, so equal
 * descriptors always serialize to equal bytes.
 */

import { fileURLToPath } from 'url';
import protobuf from 'protobufjs';
import type { Message, Type } from 'protobufjs';
import { z } from 'zod';
import { IOError, ParseError, SchemaError } from '../errors.js';
import type { ModelDescriptor } from './model-descriptor.js';

/**
 * Location of the bundled SentencePiece schema.
 */
export const MODEL_PROTO_PATH = fileURLToPath(
  new URL('../../proto/sentencepiece_model.proto', import.meta.url)
);

const MODEL_PROTO_TYPE = 'sentencepiece.ModelProto';

/**
 * The parsed schema, shared by every conversion in the process. It is set on
 * the first call and cleared only when that load fails, so a later call
 * retries.
 */
let cachedModelType: Promise<Type> | null = null;

/**
 * Load the `ModelProto` message type.
 */
export function getModelProtoType(): Promise<Type> {
  if (!cachedModelType) {
    cachedModelType = protobuf
      .load(MODEL_PROTO_PATH)
      .then((root) => root.lookupType(MODEL_PROTO_TYPE))
      .catch((error: unknown) => {
        cachedModelType = null;
        throw new IOError(MODEL_PROTO_PATH, 'Cannot load model schema', { cause: error });
      });
  }
  return cachedModelType;
}

/**
 * Serialize a model descriptor to `ModelProto` bytes.
 */
export async function serializeModel(descriptor: ModelDescriptor): Promise<Uint8Array> {
  const ModelProto = await getModelProtoType();

  const message = ModelProto.fromObject({
    pieces: descriptor.pieces.map((p) => ({
      piece: p.piece,
      score: p.score,
      type: p.type,
    })),
    trainerSpec: {
      modelType: descriptor.trainerSpec.modelType,
      vocabSize: descriptor.trainerSpec.vocabSize,
    },
    normalizerSpec: { ...descriptor.normalizerSpec },
    denormalizerSpec: { ...descriptor.denormalizerSpec },
  });

  return ModelProto.encode(message).finish();
}

const NormalizerSpecSchema = z.object({
  precompiledCharsmap: z.instanceof(Uint8Array).default(() => new Uint8Array(0)),
  addDummyPrefix: z.boolean().default(true),
  removeExtraWhitespaces: z.boolean().default(true),
  escapeWhitespaces: z.boolean().default(true),
});

const ModelProtoSchema = z.object({
  pieces: z
    .array(
      z.object({
        piece: z.string(),
        score: z.number().default(0),
        type: z.enum(['NORMAL', 'UNKNOWN', 'USER_DEFINED']).default('NORMAL'),
      })
    )
    .default([]),
  trainerSpec: z.object({
    modelType: z.enum(['UNIGRAM', 'BPE', 'WORD', 'CHAR']).default('UNIGRAM'),
    vocabSize: z.number().int().default(8000),
  }),
  normalizerSpec: NormalizerSpecSchema,
  denormalizerSpec: NormalizerSpecSchema,
});

/**
 * Decode `ModelProto` bytes back into a descriptor.
 *
 * @throws SchemaError if the message lacks a section the converter writes or
 *   carries piece types the converter never produces.
 */
export async function parseModel(data: Uint8Array): Promise<ModelDescriptor> {
  const ModelProto = await getModelProtoType();

  let message: Message;
  try {
    message = ModelProto.decode(data);
  } catch (error) {
    throw new ParseError('ModelProto', error instanceof Error ? error.message : String(error), {
      cause: error,
    });
  }
  const plain = ModelProto.toObject(message, { enums: String, defaults: false });

  const result = ModelProtoSchema.safeParse(plain);
  if (!result.success) {
    const issue = result.error.issues[0];
    throw new SchemaError(`invalid model: ${issue.message}`, {
      field: issue.path.join('.'),
    });
  }

  return result.data;
}
