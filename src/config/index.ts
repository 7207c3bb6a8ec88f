export {
  type TokenizerDocuments,
  TOKENIZER_CONFIG_FILE,
  TOKENIZER_FILE,
  TokenizerConfigSchema,
  TokenizerSchema,
  AddedTokenSchema,
  parseTokenizerConfig,
  parseTokenizer,
  readJsonDocument,
  loadTokenizerDocuments,
} from './documents.js';
