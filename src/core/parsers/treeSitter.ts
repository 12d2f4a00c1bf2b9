/**
 * @fileOverview: Lazy loading of tree-sitter and the Ruby and ERB grammars
 * @module: TreeSitter
 * @keyFunctions:
 *   - createRubySyntaxParser(): A tree-sitter parser set to the Ruby grammar
 *   - createErbSyntaxParser(): A tree-sitter parser set to the embedded-template grammar
 *   - isSameNode(): Identity check for nodes reached through different paths
 * @dependencies:
 *   - tree-sitter: Native incremental parser
 *   - tree-sitter-ruby: Ruby grammar
 *   - tree-sitter-embedded-template: ERB grammar
 * @context: The native modules are required on first use, so a missing or broken build surfaces
 *   as a load failure the parser loader can report per dialect
 */

export interface SyntaxPoint {
  row: number;
  column: number;
}

export interface SyntaxNode {
  type: string;
  text: string;
  startIndex: number;
  endIndex: number;
  startPosition: SyntaxPoint;
  parent: SyntaxNode | null;
  namedChildren: SyntaxNode[];
  childForFieldName(field: string): SyntaxNode | null;
}

export interface SyntaxTree {
  rootNode: SyntaxNode;
}

export interface SyntaxParser {
  parse(source: string): SyntaxTree;
}

interface TreeSitterParser {
  setLanguage(language: unknown): void;
  parse(source: string, oldTree: SyntaxTree | null, options: { bufferSize: number }): SyntaxTree;
}

type TreeSitterConstructor = new () => TreeSitterParser;

export const RUBY_GRAMMAR = 'tree-sitter-ruby';
export const ERB_GRAMMAR = 'tree-sitter-embedded-template';

let parserConstructor: TreeSitterConstructor | null = null;
const grammars = new Map<string, unknown>();

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

function loadTreeSitter(): TreeSitterConstructor {
  if (parserConstructor) return parserConstructor;
  try {
    const loaded: TreeSitterConstructor = require('tree-sitter');
    parserConstructor = loaded;
    return loaded;
  } catch (error) {
    throw new Error(`tree-sitter could not be loaded: ${errorMessage(error)}`);
  }
}

function loadGrammar(moduleName: string): unknown {
  if (grammars.has(moduleName)) return grammars.get(moduleName);
  try {
    const mod: unknown = require(moduleName);
    const language =
      typeof mod === 'object' && mod !== null && 'default' in mod && mod.default !== undefined
        ? mod.default
        : mod;
    grammars.set(moduleName, language);
    return language;
  } catch (error) {
    throw new Error(`${moduleName} could not be loaded: ${errorMessage(error)}`);
  }
}

function createSyntaxParser(grammar: string): SyntaxParser {
  const Parser = loadTreeSitter();
  const parser = new Parser();
  parser.setLanguage(loadGrammar(grammar));
  return {
    // the binding's default read buffer is too small for large views
    parse: source => parser.parse(source, null, { bufferSize: Math.max(32 * 1024, source.length * 2) }),
  };
}

export function createRubySyntaxParser(): SyntaxParser {
  return createSyntaxParser(RUBY_GRAMMAR);
}

export function createErbSyntaxParser(): SyntaxParser {
  return createSyntaxParser(ERB_GRAMMAR);
}

export function isSameNode(a: SyntaxNode | null, b: SyntaxNode): boolean {
  return a !== null && a.type === b.type && a.startIndex === b.startIndex && a.endIndex === b.endIndex;
}
