import { readFile } from 'fs/promises';
import chalk from 'chalk';
import { convertHfTokenizer, type ProgressInfo } from '../converter.js';
import { isConversionError } from '../errors.js';
import { parseModel } from '../format/model-proto.js';
import { verifyModel } from '../verify.js';
import { parseArgs, USAGE, type CliOptions } from './args.js';

const STAGE_LABELS: Record<ProgressInfo['stage'], string> = {
  loading: 'Loading tokenizer',
  normalizing: 'Compiling normalization tables',
  assembling: 'Assembling vocabulary',
  serializing: 'Serializing model',
  writing: 'Writing model',
};

async function run(options: CliOptions): Promise<number> {
  const log = options.quiet ? () => {} : (message: string) => console.log(message);

  const result = await convertHfTokenizer(options.input, options.output, {
    onProgress: (progress) => {
      if (progress.current < progress.total) {
        log(chalk.dim(`[${progress.current + 1}/${progress.total}] ${STAGE_LABELS[progress.stage]}`));
      }
    },
    warn: (message) => console.warn(chalk.yellow(`warning: ${message}`)),
  });

  log(
    chalk.green('✓') +
      ` Wrote ${chalk.bold(result.outputPath)} (${result.byteLength} bytes, ` +
      `${result.vocabSize} pieces: ${result.normalPieceCount} vocab + ${result.addedPieceCount} added)`
  );
  if (result.skippedAddedTokens.length > 0) {
    log(chalk.dim(`  Skipped non-normalized added tokens: ${result.skippedAddedTokens.join(' ')}`));
  }

  if (options.verify) {
    const model = await parseModel(await readFile(result.outputPath));
    const problems = verifyModel(model);
    if (problems.length > 0) {
      for (const problem of problems) {
        console.error(chalk.red(`✗ ${problem}`));
      }
      return 1;
    }
    log(chalk.green('✓') + ' Verified model round trip');
  }

  return 0;
}

/**
 * Run `spm-convert` with the given arguments (without `node` and the script).
 *
 * @returns The process exit code: 0 on success, 1 when the conversion or
 *   verification fails, 2 on a usage error.
 */
export async function main(argv: readonly string[]): Promise<number> {
  const parsed = parseArgs(argv);

  if (parsed.kind === 'help') {
    console.log(USAGE);
    return 0;
  }
  if (parsed.kind === 'error') {
    console.error(chalk.red(parsed.message));
    console.error(USAGE);
    return 2;
  }

  try {
    return await run(parsed.options);
  } catch (error) {
    if (isConversionError(error)) {
      console.error(chalk.red(`${error.name}: ${error.message}`));
      return 1;
    }
    throw error;
  }
}
