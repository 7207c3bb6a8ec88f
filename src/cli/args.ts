/**
 * Command-line argument parsing for `spm-convert`.
 */

export interface CliOptions {
  input: string;
  output: string;
  verify: boolean;
  quiet: boolean;
}

export type ParsedArgs =
  | { kind: 'run'; options: CliOptions }
  | { kind: 'help' }
  | { kind: 'error'; message: string };

export const USAGE = `Usage: spm-convert <tokenizer-dir> <output.model> [options]

Convert a Hugging Face tokenizer (tokenizer_config.json + tokenizer.json)
into a SentencePiece BPE model.

Options:
  --verify   Read the written model back and check it
  --quiet    Only print errors
  -h, --help Show this help`;

export function parseArgs(args: readonly string[]): ParsedArgs {
  const positional: string[] = [];
  let verify = false;
  let quiet = false;

  for (const arg of args) {
    if (arg === '--help' || arg === '-h') {
      return { kind: 'help' };
    } else if (arg === '--verify') {
      verify = true;
    } else if (arg === '--quiet') {
      quiet = true;
    } else if (arg.startsWith('-')) {
      return { kind: 'error', message: `Unknown option: ${arg}` };
    } else {
      positional.push(arg);
    }
  }

  if (positional.length !== 2) {
    return {
      kind: 'error',
      message: `Expected <tokenizer-dir> and <output.model>, got ${positional.length} argument(s)`,
    };
  }

  const [input, output] = positional;
  return { kind: 'run', options: { input, output, verify, quiet } };
}
