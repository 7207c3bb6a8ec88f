import { describe, it, expect } from 'vitest';
import { parseArgs } from '../src/cli/args.js';

describe('parseArgs', () => {
  it('should read input and output paths', () => {
    expect(parseArgs(['./gpt2', './out/gpt2.model'])).toEqual({
      kind: 'run',
      options: { input: './gpt2', output: './out/gpt2.model', verify: false, quiet: false },
    });
  });

  it('should read flags in any position', () => {
    expect(parseArgs(['--verify', './gpt2', '--quiet', 'gpt2.model'])).toEqual({
      kind: 'run',
      options: { input: './gpt2', output: 'gpt2.model', verify: true, quiet: true },
    });
  });

  it('should return help', () => {
    expect(parseArgs(['-h'])).toEqual({ kind: 'help' });
    expect(parseArgs(['./gpt2', '--help'])).toEqual({ kind: 'help' });
  });

  it('should reject unknown options', () => {
    expect(parseArgs(['--force', 'a', 'b'])).toEqual({
      kind: 'error',
      message: 'Unknown option: --force',
    });
  });

  it('should require exactly two paths', () => {
    expect(parseArgs(['./gpt2'])).toEqual({
      kind: 'error',
      message: 'Expected <tokenizer-dir> and <output.model>, got 1 argument(s)',
    });
  });
});
