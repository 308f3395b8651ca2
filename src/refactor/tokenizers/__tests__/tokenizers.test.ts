/**
 * Tests for the Python and TypeScript tokenizers.
 */

import { describe, it, expect } from '@jest/globals';
import { PythonTokenizer } from '../python.js';
import { TypeScriptTokenizer } from '../typescript.js';
import { tokenizerForPath, TOKENIZED_EXTENSIONS } from '../index.js';
import { TokenizeError, type Token, type TokenKind } from '../types.js';

const textsOf = (tokens: Token[], kind: TokenKind): string[] =>
  tokens.filter((token) => token.kind === kind).map((token) => token.text);

const join = (tokens: Token[]): string => tokens.map((token) => token.text).join('');

describe('PythonTokenizer', () => {
  const tokenizer = new PythonTokenizer();

  it('separates names from comments and strings', () => {
    const source = 'foo = 1  # rename foo later\nx = "foo"\n';

    const tokens = tokenizer.tokenize(source);

    expect(textsOf(tokens, 'identifier')).toEqual(['foo', 'x']);
    expect(textsOf(tokens, 'comment')).toEqual(['# rename foo later']);
    expect(textsOf(tokens, 'string')).toEqual(['"foo"']);
    expect(join(tokens)).toBe(source);
  });

  it('keeps prefixed strings and f-strings whole', () => {
    const tokens = tokenizer.tokenize('b = rb\'foo\' + f"{foo}"\n');

    expect(textsOf(tokens, 'identifier')).toEqual(['b']);
    expect(textsOf(tokens, 'string')).toEqual(["rb'foo'", 'f"{foo}"']);
  });

  it('reads triple-quoted strings across lines', () => {
    const source = 's = """a "foo"\nfoo"""\nfoo\n';

    const tokens = tokenizer.tokenize(source);

    expect(textsOf(tokens, 'identifier')).toEqual(['s', 'foo']);
    expect(join(tokens)).toBe(source);
  });

  it('honours escaped quotes', () => {
    const tokens = tokenizer.tokenize("s = 'it\\'s foo' + foo\n");

    expect(textsOf(tokens, 'identifier')).toEqual(['s', 'foo']);
    expect(textsOf(tokens, 'string')).toEqual(["'it\\'s foo'"]);
  });

  it('reads numbers without splitting off names', () => {
    const tokens = tokenizer.tokenize('x1 = 1e-5 + 0x1F + .5j\n');

    expect(textsOf(tokens, 'identifier')).toEqual(['x1']);
    expect(textsOf(tokens, 'number')).toEqual(['1e-5', '0x1F', '.5j']);
  });

  it('accepts non-ASCII names', () => {
    expect(textsOf(tokenizer.tokenize('café = 1\n'), 'identifier')).toEqual(['café']);
  });

  it('rejects an unterminated string', () => {
    expect(() => tokenizer.tokenize('x = "abc\ny = 1\n')).toThrow(TokenizeError);
    expect(() => tokenizer.tokenize("doc = '''never closed\n")).toThrow(
      'Unterminated string literal at offset 6'
    );
  });
});

describe('TypeScriptTokenizer', () => {
  const tokenizer = new TypeScriptTokenizer();

  it('finds identifiers in code, including template expressions', () => {
    const source = 'const foo = 1; // foo\nconst s = "foo" + `foo ${foo}`;\n';

    const tokens = tokenizer.tokenize(source, 'a.ts');

    expect(textsOf(tokens, 'identifier')).toEqual(['foo', 's', 'foo']);
    expect(join(tokens)).toBe(source);
  });

  it('leaves doc comments alone', () => {
    const source = '/** Uses {@link foo} */\nfunction foo() {}\n';

    const tokens = tokenizer.tokenize(source, 'a.ts');

    expect(textsOf(tokens, 'identifier')).toEqual(['foo']);
    expect(join(tokens)).toBe(source);
  });

  it('parses JSX by extension', () => {
    const tokens = tokenizer.tokenize('const el = <Foo bar={foo} />;\n', 'a.tsx');

    expect(textsOf(tokens, 'identifier')).toEqual(['el', 'Foo', 'bar', 'foo']);
  });

  it('parses plain JavaScript', () => {
    const tokens = tokenizer.tokenize('module.exports = function foo(a) { return a; };\n', 'a.js');

    expect(textsOf(tokens, 'identifier')).toEqual(['module', 'exports', 'foo', 'a', 'a']);
  });

  it('rejects source with syntax errors', () => {
    expect(() => tokenizer.tokenize('const = ;\n', 'broken.ts')).toThrow(TokenizeError);
  });
});

describe('tokenizerForPath', () => {
  it('picks a tokenizer by extension', () => {
    expect(tokenizerForPath('pkg/mod.py')?.language).toBe('python');
    expect(tokenizerForPath('types/mod.pyi')?.language).toBe('python');
    expect(tokenizerForPath('src/App.TSX')?.language).toBe('typescript');
    expect(tokenizerForPath('lib/index.cjs')?.language).toBe('typescript');
    expect(tokenizerForPath('main.go')).toBeUndefined();
  });

  it('lists the tokenized extensions', () => {
    expect(TOKENIZED_EXTENSIONS).toEqual([
      'py',
      'pyi',
      'ts',
      'tsx',
      'mts',
      'cts',
      'js',
      'jsx',
      'mjs',
      'cjs',
    ]);
  });
});
