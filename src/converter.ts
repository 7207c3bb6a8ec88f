import { loadTokenizerDocuments, type TokenizerDocuments } from './config/documents.js';
import { buildModelDescriptor, type ModelDescriptor } from './format/model-descriptor.js';
import { serializeModel } from './format/model-proto.js';
import { writeFileAtomic } from './io/write-file.js';
import { buildDenormalizerSpec, buildNormalizerSpec } from './normalizer/chars-map.js';
import { assembleVocab, type AssembledVocab } from './vocab/assembler.js';

/**
 * Progress information callback payload.
 */
export interface ProgressInfo {
  stage: 'loading' | 'normalizing' | 'assembling' | 'serializing' | 'writing';
  current: number;
  total: number;
}

/**
 * Options for TokenizerConverter.
 */
export interface ConverterOptions {
  /** Directory holding tokenizer_config.json and tokenizer.json */
  input: string;

  /** Path of the SentencePiece model file to write */
  output: string;

  /** Progress callback */
  onProgress?: (progress: ProgressInfo) => void;

  /** Sink for non-fatal warnings (default: console.warn) */
  warn?: (message: string) => void;
}

/**
 * Result of a conversion.
 */
export interface ConversionResult {
  /** Path the model was written to */
  outputPath: string;

  /** Vocab size recorded in the trainer spec */
  vocabSize: number;

  /** Pieces taken from model.vocab */
  normalPieceCount: number;

  /** Added tokens kept as USER_DEFINED pieces */
  addedPieceCount: number;

  /** Contents of added tokens dropped because they are not normalized */
  skippedAddedTokens: string[];

  /** Id of the UNKNOWN piece, or -1 */
  unknownPieceId: number;

  /** Size of the written model in bytes */
  byteLength: number;
}

/**
 * A model descriptor together with how its vocabulary was assembled.
 */
export interface ModelBuild {
  descriptor: ModelDescriptor;
  vocab: AssembledVocab;
}

/**
 * Callbacks for {@link buildModelFromDocuments}.
 */
export interface BuildHooks {
  warn?: (message: string) => void;
  onStage?: (stage: 'normalizing' | 'assembling') => void;
}

const TOTAL_STAGES = 5;

/**
 * Build the model descriptor for already-loaded documents.
 */
export function buildModelFromDocuments(
  documents: TokenizerDocuments,
  hooks: BuildHooks = {}
): ModelBuild {
  const warn = hooks.warn ?? console.warn;

  if (documents.modelType !== undefined && documents.modelType !== 'BPE') {
    warn(`tokenizer.json declares model type "${documents.modelType}"; writing a BPE model.`);
  }

  hooks.onStage?.('normalizing');
  const normalizerSpec = buildNormalizerSpec();
  const denormalizerSpec = buildDenormalizerSpec();

  hooks.onStage?.('assembling');
  const vocab = assembleVocab(documents.vocab, documents.unkToken, documents.addedTokens);
  if (vocab.unknownPieceId < 0) {
    warn(
      `unk_token ${JSON.stringify(documents.unkToken)} is not in the vocabulary; ` +
        'no piece is marked UNKNOWN.'
    );
  }

  const descriptor = buildModelDescriptor({
    normalizerSpec,
    denormalizerSpec,
    pieces: vocab.pieces,
  });

  return { descriptor, vocab };
}

/**
 * Converts a Hugging Face tokenizer directory into a SentencePiece model.
 *
 * Usage:
 * ```typescript
 * const converter = new TokenizerConverter({
 *   input: './gpt2-tokenizer',
 *   output: './out/gpt2.model',
 * });
 *
 * const result = await converter.convert();
 * console.log(`${result.vocabSize} pieces written to ${result.outputPath}`);
 * ```
 */
export class TokenizerConverter {
  private options: ConverterOptions;

  constructor(options: ConverterOptions) {
    this.options = options;
  }

  /**
   * Run the conversion: load config → load tokenizer → build normalization
   * tables → assemble vocabulary → assemble model → serialize → write.
   *
   * The first failure is thrown and the output path is left untouched.
   */
  async convert(): Promise<ConversionResult> {
    const warn = this.options.warn ?? console.warn;

    this.reportProgress('loading', 0);
    const documents = await loadTokenizerDocuments(this.options.input);

    const { descriptor, vocab } = buildModelFromDocuments(documents, {
      warn,
      onStage: (stage) => this.reportProgress(stage, stage === 'normalizing' ? 1 : 2),
    });

    this.reportProgress('serializing', 3);
    const data = await serializeModel(descriptor);

    this.reportProgress('writing', 4);
    await writeFileAtomic(this.options.output, data);

    this.reportProgress('writing', TOTAL_STAGES);

    return {
      outputPath: this.options.output,
      vocabSize: descriptor.trainerSpec.vocabSize,
      normalPieceCount: vocab.normalPieceCount,
      addedPieceCount: vocab.pieces.length - vocab.normalPieceCount,
      skippedAddedTokens: vocab.skippedAddedTokens.map((t) => t.content),
      unknownPieceId: vocab.unknownPieceId,
      byteLength: data.length,
    };
  }

  /**
   * Report progress to the callback if provided.
   */
  private reportProgress(stage: ProgressInfo['stage'], current: number): void {
    this.options.onProgress?.({ stage, current, total: TOTAL_STAGES });
  }
}

/**
 * Convert the tokenizer in `input` and write the model to `output`.
 */
export function convertHfTokenizer(
  input: string,
  output: string,
  options: Omit<ConverterOptions, 'input' | 'output'> = {}
): Promise<ConversionResult> {
  return new TokenizerConverter({ ...options, input, output }).convert();
}
