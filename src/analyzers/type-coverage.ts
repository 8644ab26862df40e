import type { Logger, TypeCoverage } from '../types/index.js';
import { readBytes, walkFiles } from '../utils/fs.js';
import { parsePython, walkTree, type SyntaxNode } from './python-parser.js';

const EXCLUDED_DIRS: ReadonlySet<string> = new Set([
  'venv',
  '.venv',
  'env',
  '.env',
  'node_modules',
  '__pycache__',
  '.git',
  'build',
  'dist',
]);

const utf8 = new TextDecoder('utf-8', { fatal: true });

/**
 * A parameter annotation only counts on a named parameter, not on *args / **kwargs
 */
function isAnnotatedParameter(param: SyntaxNode): boolean {
  if (param.type === 'typed_default_parameter') return true;
  if (param.type !== 'typed_parameter') return false;
  return param.namedChildren[0]?.type === 'identifier';
}

function isAnnotatedFunction(fn: SyntaxNode): boolean {
  if (fn.childForFieldName('return_type')) return true;
  const params = fn.childForFieldName('parameters');
  return params ? params.namedChildren.some(isAnnotatedParameter) : false;
}

function decode(buffer: Buffer): string | null {
  try {
    return utf8.decode(buffer);
  } catch {
    return null;
  }
}

/**
 * Measure the share of function definitions carrying at least one type annotation.
 * Files that are not valid UTF-8 or do not parse are skipped.
 */
export async function analyzeTypeCoverage(root: string, logger?: Logger): Promise<TypeCoverage> {
  let total = 0;
  let annotated = 0;

  const files = await walkFiles(root, { extension: '.py', excludeDirs: EXCLUDED_DIRS });

  for (const file of files) {
    const source = decode(await readBytes(file));
    const tree = source === null ? null : parsePython(source);
    if (!tree) {
      logger?.debug(`Skipping unparseable file: ${file}`);
      continue;
    }

    walkTree(tree, (node) => {
      if (node.type !== 'function_definition') return;
      total++;
      if (isAnnotatedFunction(node)) annotated++;
    });
  }

  if (total === 0) {
    return { percentage: 100, annotated: 0, total: 0 };
  }

  return { percentage: (annotated / total) * 100, annotated, total };
}
