/**
 * Import Extraction
 *
 * Reads `import` and `from ... import` statements into ImportDescriptors.
 */

import type Parser from 'tree-sitter';
import { WILDCARD_IMPORT, type ImportDescriptor } from '../../models/StructuralModel.js';
import { codeChildren, isSameNode, lineOf } from './node-utils.js';

export const IMPORT_NODE_TYPES = ['import_statement', 'import_from_statement', 'future_import_statement'];

/**
 * Check if a Tree-sitter node is an import statement
 */
export function isImportNode(node: Parser.SyntaxNode): boolean {
  return IMPORT_NODE_TYPES.includes(node.type);
}

/**
 * Module named by a from-import, without relative-import dots
 */
export function moduleNameOf(node: Parser.SyntaxNode): string {
  if (node.type === 'future_import_statement') {
    return '__future__';
  }
  const moduleNode = node.childForFieldName('module_name');
  if (!moduleNode) return '';
  if (moduleNode.type === 'relative_import') {
    const dotted = moduleNode.namedChildren.find(c => c.type === 'dotted_name');
    return dotted ? dotted.text : '';
  }
  return moduleNode.text;
}

/**
 * Parse an import statement node
 */
export function extractImport(node: Parser.SyntaxNode): ImportDescriptor {
  const isFromImport = node.type !== 'import_statement';
  const moduleNode = node.childForFieldName('module_name');
  const importedNames: string[] = [];
  const aliases = new Map<string, string>();

  for (const child of codeChildren(node)) {
    if (isSameNode(child, moduleNode)) continue;

    switch (child.type) {
      case 'dotted_name':
        importedNames.push(child.text);
        break;
      case 'aliased_import': {
        const name = child.childForFieldName('name');
        const alias = child.childForFieldName('alias');
        if (!name) break;
        importedNames.push(name.text);
        if (alias) aliases.set(name.text, alias.text);
        break;
      }
      case 'wildcard_import':
        importedNames.push(WILDCARD_IMPORT);
        break;
      default:
        break;
    }
  }

  return Object.freeze({
    module: isFromImport ? moduleNameOf(node) : '',
    importedNames,
    aliases,
    isFromImport,
    line: lineOf(node),
  });
}

/**
 * Collect every import statement in the tree, in source order
 */
export function extractImports(root: Parser.SyntaxNode): ImportDescriptor[] {
  const found: ImportDescriptor[] = [];

  const walk = (node: Parser.SyntaxNode): void => {
    if (isImportNode(node)) {
      found.push(extractImport(node));
      return;
    }
    for (const child of node.namedChildren) {
      walk(child);
    }
  };

  walk(root);
  return found;
}
