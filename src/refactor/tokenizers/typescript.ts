/**
 * Identifier tokenizer for TypeScript and JavaScript, built on the compiler's
 * parser. Identifiers are the parse tree's Identifier nodes; the text between
 * them (keywords, punctuation, literals, comments) is kept as `other` tokens.
 */

import * as path from 'node:path';
import ts from 'typescript';

import { TokenizeError, type Token, type Tokenizer } from './types.js';

const SCRIPT_KINDS: Readonly<Record<string, ts.ScriptKind>> = {
  '.ts': ts.ScriptKind.TS,
  '.mts': ts.ScriptKind.TS,
  '.cts': ts.ScriptKind.TS,
  '.tsx': ts.ScriptKind.TSX,
  '.js': ts.ScriptKind.JS,
  '.mjs': ts.ScriptKind.JS,
  '.cjs': ts.ScriptKind.JS,
  '.jsx': ts.ScriptKind.JSX,
};

interface Span {
  start: number;
  end: number;
}

export function scriptKindForPath(fileName: string): ts.ScriptKind {
  return SCRIPT_KINDS[path.extname(fileName).toLowerCase()] ?? ts.ScriptKind.TS;
}

/**
 * Syntax errors recorded while parsing. The parser recovers from them, so a
 * tree built from a broken file cannot be trusted for renaming.
 */
function syntaxErrors(sourceFile: ts.SourceFile): readonly ts.Diagnostic[] {
  const options: ts.CompilerOptions = {
    allowJs: true,
    noLib: true,
    noResolve: true,
    types: [],
    jsx: ts.JsxEmit.Preserve,
  };
  const host = ts.createCompilerHost(options);
  host.getSourceFile = (fileName) => (fileName === sourceFile.fileName ? sourceFile : undefined);
  const program = ts.createProgram({ rootNames: [sourceFile.fileName], options, host });
  return program.getSyntacticDiagnostics(sourceFile);
}

export class TypeScriptTokenizer implements Tokenizer {
  readonly language = 'typescript';

  tokenize(source: string, fileName: string): Token[] {
    const sourceFile = ts.createSourceFile(
      fileName,
      source,
      ts.ScriptTarget.Latest,
      true,
      scriptKindForPath(fileName)
    );

    const first = syntaxErrors(sourceFile)[0];
    if (first !== undefined) {
      throw new TokenizeError(
        `${fileName}: ${ts.flattenDiagnosticMessageText(first.messageText, '\n')}`,
        first.start
      );
    }

    const spans: Span[] = [];
    const visit = (node: ts.Node): void => {
      if (ts.isIdentifier(node)) {
        spans.push({ start: node.getStart(sourceFile), end: node.end });
        return;
      }
      ts.forEachChild(node, visit);
    };
    visit(sourceFile);
    spans.sort((a, b) => a.start - b.start);

    const tokens: Token[] = [];
    let offset = 0;
    for (const span of spans) {
      if (span.start < offset) {
        continue;
      }
      if (span.start > offset) {
        tokens.push({ kind: 'other', text: source.slice(offset, span.start) });
      }
      tokens.push({ kind: 'identifier', text: source.slice(span.start, span.end) });
      offset = span.end;
    }
    if (offset < source.length) {
      tokens.push({ kind: 'other', text: source.slice(offset) });
    }
    return tokens;
  }
}
