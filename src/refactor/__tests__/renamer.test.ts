/**
 * Tests for the token-aware and regex renamers.
 */

import { describe, it, expect, jest } from '@jest/globals';
import { RegexFallbackRenamer, TokenAwareRenamer, renameInSource } from '../renamer.js';
import { PythonTokenizer } from '../tokenizers/python.js';

describe('TokenAwareRenamer', () => {
  it('renames only the identifier occurrence', () => {
    const renamer = new TokenAwareRenamer(new PythonTokenizer());

    const outcome = renamer.rename(
      'foo = 1  # rename foo later\nx = "foo"\n',
      'a.py',
      'foo',
      'bar'
    );

    expect(outcome).toEqual({
      content: 'bar = 1  # rename foo later\nx = "foo"\n',
      replacements: 1,
      strategy: 'tokens',
    });
  });

  it('does not touch longer names that contain the symbol', () => {
    const renamer = new TokenAwareRenamer(new PythonTokenizer());

    const outcome = renamer.rename('foo_bar = foo + _foo\n', 'a.py', 'foo', 'baz');

    expect(outcome.content).toBe('foo_bar = baz + _foo\n');
    expect(outcome.replacements).toBe(1);
  });
});

describe('RegexFallbackRenamer', () => {
  const renamer = new RegexFallbackRenamer();

  it('treats $ as part of a word', () => {
    const outcome = renamer.rename('$foo + foo$ + foo', 'a.js', 'foo', 'bar');

    expect(outcome).toEqual({ content: '$foo + foo$ + bar', replacements: 1, strategy: 'regex' });
  });

  it('inserts the new name literally', () => {
    expect(renamer.rename('foo()', 'a.go', 'foo', '$$x').content).toBe('$$x()');
  });

  it('matches names that start with $', () => {
    const outcome = renamer.rename('$el.show(); my$el = $el;', 'a.js', '$el', 'node');

    expect(outcome.content).toBe('node.show(); my$el = node;');
    expect(outcome.replacements).toBe(2);
  });
});

describe('renameInSource', () => {
  it('uses tokens for Python files', () => {
    const outcome = renameInSource('pkg/a.py', 'foo = 1  # rename foo later\nx = "foo"\n', 'foo', 'bar');

    expect(outcome.content).toBe('bar = 1  # rename foo later\nx = "foo"\n');
    expect(outcome.replacements).toBe(1);
    expect(outcome.strategy).toBe('tokens');
  });

  it('uses tokens for TypeScript files', () => {
    const outcome = renameInSource(
      'src/a.ts',
      'const foo = "foo"; // foo\nexport { foo };\n',
      'foo',
      'bar'
    );

    expect(outcome).toEqual({
      content: 'const bar = "foo"; // foo\nexport { bar };\n',
      replacements: 2,
      strategy: 'tokens',
    });
  });

  it('falls back to the regex renamer when tokenization fails', () => {
    const onDebug = jest.fn();

    const outcome = renameInSource(
      'broken.py',
      'foo = "abc\nfoo_bar = foo\n',
      'foo',
      'bar',
      { onDebug }
    );

    expect(outcome).toEqual({
      content: 'bar = "abc\nfoo_bar = bar\n',
      replacements: 2,
      strategy: 'regex',
    });
    expect(onDebug).toHaveBeenCalledWith('Tokenization failed; using regex rename', {
      path: 'broken.py',
      message: 'Unterminated string literal at offset 6',
    });
  });

  it('uses the regex renamer for extensions without a tokenizer', () => {
    const outcome = renameInSource('main.go', 'x := foo() // foo\n', 'foo', 'bar');

    expect(outcome).toEqual({ content: 'x := bar() // bar\n', replacements: 2, strategy: 'regex' });
  });
});
