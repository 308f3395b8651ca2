/**
 * Tokenizer selection by file extension.
 */

import * as path from 'node:path';

import { PythonTokenizer } from './python.js';
import type { Tokenizer } from './types.js';
import { TypeScriptTokenizer } from './typescript.js';

const python = new PythonTokenizer();
const typescript = new TypeScriptTokenizer();

const TOKENIZERS: Readonly<Record<string, Tokenizer>> = {
  '.py': python,
  '.pyi': python,
  '.ts': typescript,
  '.tsx': typescript,
  '.mts': typescript,
  '.cts': typescript,
  '.js': typescript,
  '.jsx': typescript,
  '.mjs': typescript,
  '.cjs': typescript,
};

/** Extensions with a tokenizer, without the leading dot */
export const TOKENIZED_EXTENSIONS = Object.keys(TOKENIZERS).map((ext) => ext.slice(1));

export function tokenizerForPath(filePath: string): Tokenizer | undefined {
  return TOKENIZERS[path.extname(filePath).toLowerCase()];
}

export { PythonTokenizer } from './python.js';
export { TypeScriptTokenizer, scriptKindForPath } from './typescript.js';
export { TokenizeError } from './types.js';
export type { Token, TokenKind, Tokenizer } from './types.js';
