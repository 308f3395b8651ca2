/**
 * Token-exact rename and the apply-and-validate loop.
 */

export { RefactorEngine, DEFAULT_INCLUDE_GLOBS, RENAME_RATIONALE } from './engine.js';
export type { RefactorEngineOptions, RenameOptions } from './engine.js';
export { applyAndValidate, createDefaultTestRunner, toTestOutcome } from './validate.js';
export { RegexFallbackRenamer, TokenAwareRenamer, renameInSource } from './renamer.js';
export type { RenameOutcome, RenameStrategy, Renamer } from './renamer.js';
export {
  PythonTokenizer,
  TypeScriptTokenizer,
  TokenizeError,
  tokenizerForPath,
  TOKENIZED_EXTENSIONS,
} from './tokenizers/index.js';
export type { Token, TokenKind, Tokenizer } from './tokenizers/index.js';
export type {
  FileChangeStat,
  RefactorPlan,
  RefactorTemplate,
  SafetyReport,
  TestOutcome,
  TestRunnerFn,
  ValidateOptions,
  ValidateResult,
} from './types.js';
