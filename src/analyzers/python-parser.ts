import { createRequire } from 'node:module';

export type SyntaxNode = {
  type: string;
  namedChildren: SyntaxNode[];
  childForFieldName: (field: string) => SyntaxNode | null;
  hasError: boolean | (() => boolean);
};
type SyntaxTree = { rootNode: SyntaxNode };
type ParseInput = (index: number) => string | null;
type TreeSitterParser = {
  setLanguage: (language: object) => void;
  parse: (input: ParseInput) => SyntaxTree;
};
type TreeSitterConstructor = new () => TreeSitterParser;

const require = createRequire(import.meta.url);

// The native binding rejects single string inputs past ~32K characters
const CHUNK_SIZE = 16 * 1024;

let parser: TreeSitterParser | undefined;

function loadParser(): TreeSitterParser {
  if (!parser) {
    const Parser: TreeSitterConstructor = require('tree-sitter');
    const python: object = require('tree-sitter-python');
    parser = new Parser();
    parser.setLanguage(python);
  }
  return parser;
}

export function nodeHasError(node: SyntaxNode): boolean {
  return typeof node.hasError === 'function' ? node.hasError() : node.hasError;
}

/**
 * Parse Python source into a syntax tree.
 * Returns null when the source does not parse cleanly.
 */
export function parsePython(source: string): SyntaxNode | null {
  const python = loadParser();
  let tree: SyntaxTree;
  try {
    tree = python.parse((index) =>
      index < source.length ? source.slice(index, index + CHUNK_SIZE) : null
    );
  } catch {
    return null;
  }
  return nodeHasError(tree.rootNode) ? null : tree.rootNode;
}

/**
 * Depth-first walk over named nodes
 */
export function walkTree(node: SyntaxNode, visitor: (node: SyntaxNode) => void): void {
  visitor(node);
  for (const child of node.namedChildren) {
    walkTree(child, visitor);
  }
}
