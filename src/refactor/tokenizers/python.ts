/**
 * Lexer for Python source.
 *
 * Recognizes names, string literals (with prefixes and triple quotes),
 * comments and numbers; every other character becomes an `other` token.
 * f-strings are kept whole as a single string token, so names inside their
 * replacement fields are left alone.
 */

import { TokenizeError, type Token, type Tokenizer } from './types.js';

const WHITESPACE = /[ \t\f\r\n]+/y;
const NAME = /[\p{L}\p{Nl}_][\p{L}\p{Nl}\p{Mn}\p{Mc}\p{Nd}\p{Pc}]*/uy;
const NUMBER =
  /0[xXoObB][\da-fA-F_]+|(?:\d[\d_]*(?:\.[\d_]*)?|\.\d[\d_]*)(?:[eE][+-]?\d[\d_]*)?[jJ]?/y;
const STRING_PREFIX = /^(?:[rRbBuUfF]|[rR][bBfF]|[bBfF][rR])$/;

function matchAt(pattern: RegExp, source: string, offset: number): string | undefined {
  pattern.lastIndex = offset;
  return pattern.exec(source)?.[0];
}

function isQuote(ch: string): boolean {
  return ch === '"' || ch === "'";
}

/**
 * Find the end of a string literal whose opening quote is at `quoteOffset`.
 * @returns Offset just past the closing quote
 */
function scanString(source: string, quoteOffset: number): number {
  const quote = source.charAt(quoteOffset);
  const triple = source.startsWith(quote.repeat(3), quoteOffset);
  const closing = triple ? quote.repeat(3) : quote;
  let index = quoteOffset + closing.length;

  while (index < source.length) {
    const ch = source.charAt(index);
    if (ch === '\\') {
      index += 2;
      continue;
    }
    if (source.startsWith(closing, index)) {
      return index + closing.length;
    }
    if (!triple && ch === '\n') {
      break;
    }
    index++;
  }
  throw new TokenizeError(`Unterminated string literal at offset ${quoteOffset}`, quoteOffset);
}

export class PythonTokenizer implements Tokenizer {
  readonly language = 'python';

  tokenize(source: string): Token[] {
    const tokens: Token[] = [];
    let offset = 0;

    const push = (kind: Token['kind'], end: number): void => {
      tokens.push({ kind, text: source.slice(offset, end) });
      offset = end;
    };

    while (offset < source.length) {
      const ch = source.charAt(offset);

      if (ch === '#') {
        const newline = source.indexOf('\n', offset);
        push('comment', newline === -1 ? source.length : newline);
        continue;
      }

      if (isQuote(ch)) {
        push('string', scanString(source, offset));
        continue;
      }

      const whitespace = matchAt(WHITESPACE, source, offset);
      if (whitespace !== undefined) {
        push('other', offset + whitespace.length);
        continue;
      }

      const name = matchAt(NAME, source, offset);
      if (name !== undefined) {
        const after = offset + name.length;
        if (isQuote(source.charAt(after)) && STRING_PREFIX.test(name)) {
          push('string', scanString(source, after));
        } else {
          push('identifier', after);
        }
        continue;
      }

      const number = matchAt(NUMBER, source, offset);
      if (number !== undefined) {
        push('number', offset + number.length);
        continue;
      }

      push('other', offset + 1);
    }

    return tokens;
  }
}
