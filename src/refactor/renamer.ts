/**
 * Identifier renamers. The token-aware variant touches identifier tokens
 * only; the regex variant is the fallback for files without a tokenizer or
 * whose tokenization failed.
 */

import type { PatchEngineCallbacks } from '../patch/callbacks.js';
import { tokenizerForPath } from './tokenizers/index.js';
import type { Tokenizer } from './tokenizers/types.js';

export type RenameStrategy = 'tokens' | 'regex';

export interface RenameOutcome {
  content: string;
  replacements: number;
  strategy: RenameStrategy;
}

export interface Renamer {
  readonly strategy: RenameStrategy;
  rename(source: string, fileName: string, oldName: string, newName: string): RenameOutcome;
}

export class TokenAwareRenamer implements Renamer {
  readonly strategy = 'tokens';

  constructor(private readonly tokenizer: Tokenizer) {}

  rename(source: string, fileName: string, oldName: string, newName: string): RenameOutcome {
    let replacements = 0;
    const content = this.tokenizer
      .tokenize(source, fileName)
      .map((token) => {
        if (token.kind === 'identifier' && token.text === oldName) {
          replacements++;
          return newName;
        }
        return token.text;
      })
      .join('');
    return { content, replacements, strategy: this.strategy };
  }
}

function escapeRegExp(text: string): string {
  return text.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

/**
 * Whole-word replace over raw text. `$` counts as a word character so that
 * `$foo` and `foo$` are distinct from `foo`.
 */
export class RegexFallbackRenamer implements Renamer {
  readonly strategy = 'regex';

  rename(source: string, _fileName: string, oldName: string, newName: string): RenameOutcome {
    const pattern = new RegExp(`(?<![\\w$])${escapeRegExp(oldName)}(?![\\w$])`, 'g');
    let replacements = 0;
    const content = source.replace(pattern, () => {
      replacements++;
      return newName;
    });
    return { content, replacements, strategy: this.strategy };
  }
}

const regexFallback = new RegexFallbackRenamer();

/**
 * Rename with the file's tokenizer, falling back to the regex renamer when
 * there is none or it fails.
 */
export function renameInSource(
  fileName: string,
  source: string,
  oldName: string,
  newName: string,
  callbacks?: PatchEngineCallbacks
): RenameOutcome {
  const tokenizer = tokenizerForPath(fileName);
  if (tokenizer !== undefined) {
    try {
      return new TokenAwareRenamer(tokenizer).rename(source, fileName, oldName, newName);
    } catch (error) {
      callbacks?.onDebug?.('Tokenization failed; using regex rename', {
        path: fileName,
        message: error instanceof Error ? error.message : String(error),
      });
    }
  }
  return regexFallback.rename(source, fileName, oldName, newName);
}
