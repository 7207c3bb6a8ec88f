import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { mkdtemp, readFile, rm, writeFile } from 'fs/promises';
import { tmpdir } from 'os';
import * as path from 'path';
import { main } from '../src/cli/run.js';
import { parseModel } from '../src/format/model-proto.js';

describe('spm-convert', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(path.join(tmpdir(), 'spm-convert-cli-'));
    vi.spyOn(console, 'log').mockImplementation(() => {});
    vi.spyOn(console, 'warn').mockImplementation(() => {});
    vi.spyOn(console, 'error').mockImplementation(() => {});
  });

  afterEach(async () => {
    vi.restoreAllMocks();
    await rm(dir, { recursive: true, force: true });
  });

  async function writeTokenizer(config: unknown): Promise<void> {
    await writeFile(path.join(dir, 'tokenizer_config.json'), JSON.stringify(config));
    await writeFile(
      path.join(dir, 'tokenizer.json'),
      JSON.stringify({ model: { type: 'BPE', vocab: { '<unk>': 0, a: 1, b: 2 } } })
    );
  }

  it('should print usage and exit 0 for --help', async () => {
    expect(await main(['--help'])).toBe(0);
    expect(console.log).toHaveBeenCalledWith(expect.stringContaining('Usage: spm-convert'));
  });

  it('should exit 2 on a wrong argument count', async () => {
    expect(await main([dir])).toBe(2);
    expect(console.error).toHaveBeenCalledWith(
      expect.stringContaining('Expected <tokenizer-dir> and <output.model>, got 1 argument(s)')
    );
  });

  it('should exit 2 on an unknown option', async () => {
    expect(await main([dir, path.join(dir, 'out.model'), '--fast'])).toBe(2);
    expect(console.error).toHaveBeenCalledWith(expect.stringContaining('Unknown option: --fast'));
  });

  it('should exit 1 when unk_token is missing', async () => {
    await writeTokenizer({ bos_token: '<s>' });

    expect(await main([dir, path.join(dir, 'out.model')])).toBe(1);
    expect(console.error).toHaveBeenCalledWith(
      expect.stringContaining('SchemaError: tokenizer_config.json: missing field "unk_token"')
    );
  });

  it('should convert and verify a valid tokenizer', async () => {
    await writeTokenizer({ unk_token: '<unk>' });
    const output = path.join(dir, 'out', 'tokenizer.model');

    expect(await main([dir, output, '--verify'])).toBe(0);
    expect(console.log).toHaveBeenCalledWith(expect.stringContaining('Verified model round trip'));
    expect(console.error).not.toHaveBeenCalled();

    const model = await parseModel(await readFile(output));
    expect(model.pieces.map((p) => p.piece)).toEqual(['<unk>', 'a', 'b']);
  });

  it('should print nothing but errors with --quiet', async () => {
    await writeTokenizer({ unk_token: '<unk>' });

    expect(await main([dir, path.join(dir, 'out.model'), '--quiet'])).toBe(0);
    expect(console.log).not.toHaveBeenCalled();
  });
});
