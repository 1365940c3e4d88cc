/**
 * Tree-sitter Parser Wrapper
 *
 * Parses Python source with the tree-sitter-python grammar and turns a tree
 * that needed error recovery into a ParseError.
 */

import Parser from 'tree-sitter';
import Python from 'tree-sitter-python';
import { Result, ok, err, errorMessage } from '../../lib/result-types.js';
import { ParseError } from '../../lib/errors/DetectorErrors.js';

/**
 * Tree-sitter parser wrapper class
 */
export class TreeSitterParser {
  private parser: Parser;

  constructor() {
    this.parser = new Parser();
    this.parser.setLanguage(Python);
  }

  /**
   * Parse source code and return syntax tree
   *
   * @param source - Python source to parse
   * @param filePath - Used in error messages only
   */
  parse(source: string, filePath: string): Result<Parser.Tree, ParseError> {
    let tree: Parser.Tree;
    try {
      // Use 64KB for files < 32KB, otherwise use double the source size
      const bufferSize = source.length < 32768 ? 65536 : source.length * 2;
      tree = this.parser.parse(source, undefined, { bufferSize });
    } catch (error) {
      return err(new ParseError(filePath, `parser failure: ${errorMessage(error)}`));
    }

    if (tree.rootNode.hasError) {
      return err(this.createParseError(tree.rootNode, filePath));
    }

    const legacy = findLegacyStatement(tree.rootNode);
    if (legacy) {
      const keyword = legacy.type === 'print_statement' ? 'print' : 'exec';
      return err(new ParseError(
        filePath,
        `"${keyword}" statement is not valid in Python 3`,
        legacy.startPosition.row + 1,
        legacy.startPosition.column
      ));
    }

    return ok(tree);
  }

  /**
   * Build a ParseError pointing at the first ERROR or missing node
   */
  private createParseError(root: Parser.SyntaxNode, filePath: string): ParseError {
    const node = findFirstError(root);
    if (!node) {
      return new ParseError(filePath, 'invalid syntax');
    }

    const line = node.startPosition.row + 1;
    const column = node.startPosition.column;

    if (node.isMissing) {
      return new ParseError(filePath, `missing "${node.type}"`, line, column);
    }

    const text = node.text;
    const preview = text.length > 50 ? `${text.substring(0, 50)}...` : text;
    return new ParseError(filePath, `unexpected "${preview}"`, line, column);
  }
}

function findFirstError(node: Parser.SyntaxNode): Parser.SyntaxNode | null {
  if (node.type === 'ERROR' || node.isMissing) {
    return node;
  }
  if (!node.hasError) {
    return null;
  }
  for (const child of node.children) {
    const found = findFirstError(child);
    if (found) return found;
  }
  return null;
}

/**
 * The grammar still accepts Python 2 print and exec statements without
 * flagging an error
 */
const LEGACY_STATEMENTS = new Set(['print_statement', 'exec_statement']);

function findLegacyStatement(node: Parser.SyntaxNode): Parser.SyntaxNode | null {
  if (LEGACY_STATEMENTS.has(node.type)) {
    return node;
  }
  for (const child of node.namedChildren) {
    const found = findLegacyStatement(child);
    if (found) return found;
  }
  return null;
}
