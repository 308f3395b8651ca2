/**
 * Token stream shared by the language tokenizers.
 *
 * Streams are lossless: joining every token's text reproduces the source
 * exactly, so a rename only has to swap the text of identifier tokens.
 */

export type TokenKind = 'identifier' | 'string' | 'comment' | 'number' | 'other';

export interface Token {
  kind: TokenKind;
  text: string;
}

export interface Tokenizer {
  readonly language: string;
  /**
   * @throws TokenizeError when the source cannot be tokenized
   */
  tokenize(source: string, fileName: string): Token[];
}

/**
 * Raised when a file cannot be split into a reliable token stream.
 */
export class TokenizeError extends Error {
  public readonly offset?: number;

  constructor(message: string, offset?: number) {
    super(message);
    this.name = 'TokenizeError';
    this.offset = offset;
  }
}
