#!/usr/bin/env node
/**
 * spm-convert: convert a Hugging Face tokenizer directory into a
 * SentencePiece model file.
 *
 * Usage:
 *   spm-convert ./gpt2 ./out/gpt2.model
 *   spm-convert ./gpt2 ./out/gpt2.model --verify
 */

import { main } from './cli/run.js';

main(process.argv.slice(2)).then(
  (code) => {
    process.exitCode = code;
  },
  (error: unknown) => {
    console.error(error);
    process.exitCode = 1;
  }
);
