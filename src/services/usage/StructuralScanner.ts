/**
 * Structural Usage Scanner
 *
 * Walks the syntax tree of one candidate file in source order, tracking the
 * names its imports bind, and reports calls, attribute accesses and name
 * references whose import-resolved name contains a target element name.
 *
 * Every wildcard import is reported as a `star_import` location since it can
 * hide a reference to anything.
 */

import type Parser from 'tree-sitter';
import type { UsageKind, UsageLocation } from '../../models/UsageLocation.js';
import { codeChildren, lineOf } from '../parser/node-utils.js';
import { moduleNameOf } from '../parser/ImportExtractor.js';
import { CONTEXT_LINES_AFTER, contextWindow } from './TextScanner.js';

/** Lines kept before a structural hit; the text pass keeps fewer */
export const STRUCTURAL_CONTEXT_LINES_BEFORE = 5;

/**
 * Local name to the dotted name it was imported as
 */
export type ImportBindings = Map<string, string>;

class UsageWalker {
  private readonly bindings: ImportBindings = new Map();
  readonly found: UsageLocation[] = [];

  constructor(
    private readonly filePath: string,
    private readonly lines: readonly string[],
    private readonly elementNames: readonly string[]
  ) {}

  visit(node: Parser.SyntaxNode): void {
    switch (node.type) {
      case 'import_statement':
        this.bindImport(node);
        return;
      case 'import_from_statement':
      case 'future_import_statement':
        this.bindFromImport(node);
        return;
      case 'call':
        this.visitCall(node);
        return;
      case 'attribute':
        this.visitAttribute(node);
        return;
      case 'identifier':
        this.check(node.text, node, 'name_reference');
        return;
      case 'function_definition':
        this.visitFunction(node);
        return;
      case 'class_definition':
        this.visitFields(node, ['superclasses', 'body']);
        return;
      case 'keyword_argument':
        this.visitFields(node, ['value']);
        return;
      default:
        this.visitChildren(node);
    }
  }

  private visitChildren(node: Parser.SyntaxNode): void {
    for (const child of codeChildren(node)) {
      this.visit(child);
    }
  }

  private visitFields(node: Parser.SyntaxNode, fields: string[]): void {
    for (const field of fields) {
      const child = node.childForFieldName(field);
      if (child) this.visit(child);
    }
  }

  private bindImport(node: Parser.SyntaxNode): void {
    for (const child of codeChildren(node)) {
      if (child.type === 'dotted_name') {
        this.bindings.set(child.text, child.text);
      } else if (child.type === 'aliased_import') {
        const name = child.childForFieldName('name');
        const alias = child.childForFieldName('alias');
        if (name) this.bindings.set(alias ? alias.text : name.text, name.text);
      }
    }
  }

  private bindFromImport(node: Parser.SyntaxNode): void {
    const module = moduleNameOf(node);
    const moduleNode = node.childForFieldName('module_name');

    for (const child of codeChildren(node)) {
      if (moduleNode && child.startIndex === moduleNode.startIndex) continue;

      if (child.type === 'wildcard_import') {
        this.record(node, 'star_import');
        continue;
      }

      let name: Parser.SyntaxNode | null = null;
      let alias: Parser.SyntaxNode | null = null;
      if (child.type === 'dotted_name') {
        name = child;
      } else if (child.type === 'aliased_import') {
        name = child.childForFieldName('name');
        alias = child.childForFieldName('alias');
      }
      if (!name) continue;

      const qualified = module ? `${module}.${name.text}` : name.text;
      this.bindings.set(alias ? alias.text : name.text, qualified);
    }
  }

  private visitCall(node: Parser.SyntaxNode): void {
    const callee = node.childForFieldName('function');
    if (callee?.type === 'identifier') {
      this.check(callee.text, node, 'function_call');
    } else if (callee?.type === 'attribute') {
      const dotted = dottedName(callee);
      const attribute = callee.childForFieldName('attribute');
      if (dotted && attribute) {
        this.check(dotted, node, 'method_call');
        this.check(attribute.text, node, 'method_call');
      }
    }
    this.visitChildren(node);
  }

  private visitAttribute(node: Parser.SyntaxNode): void {
    const object = node.childForFieldName('object');
    const attribute = node.childForFieldName('attribute');
    const dotted = dottedName(node);
    if (dotted && attribute) {
      this.check(dotted, node, 'attribute_access');
      this.check(attribute.text, node, 'attribute_access');
    }
    // the attribute name itself is not a reference
    if (object) this.visit(object);
  }

  private visitFunction(node: Parser.SyntaxNode): void {
    const parameters = node.childForFieldName('parameters');
    if (parameters) {
      for (const param of codeChildren(parameters)) {
        this.visitFields(param, ['type', 'value']);
      }
    }
    this.visitFields(node, ['return_type', 'body']);
  }

  private check(name: string, node: Parser.SyntaxNode, usageKind: UsageKind): void {
    const resolved = resolveName(name, this.bindings);
    if (this.elementNames.some(element => resolved.includes(element))) {
      this.record(node, usageKind);
    }
  }

  private record(node: Parser.SyntaxNode, usageKind: UsageKind): void {
    const line = lineOf(node);
    this.found.push({
      filePath: this.filePath,
      line,
      context: contextWindow(this.lines, line, STRUCTURAL_CONTEXT_LINES_BEFORE, CONTEXT_LINES_AFTER),
      usageKind,
    });
  }
}

/**
 * `a.b.c` for an identifier or a chain of attribute accesses on one;
 * undefined when the chain starts at a call, subscript or literal
 */
function dottedName(node: Parser.SyntaxNode): string | undefined {
  if (node.type === 'identifier') {
    return node.text;
  }
  if (node.type !== 'attribute') {
    return undefined;
  }
  const object = node.childForFieldName('object');
  const attribute = node.childForFieldName('attribute');
  const head = object ? dottedName(object) : undefined;
  return head && attribute ? `${head}.${attribute.text}` : undefined;
}

/**
 * Resolve a plain or dotted name through import bindings
 *
 * The longest bound prefix wins, so `pkg.api.f` resolves through a binding
 * for `pkg.api` before one for `pkg`.
 */
export function resolveName(name: string, bindings: ImportBindings): string {
  let end = name.length;
  while (end > 0) {
    const bound = bindings.get(name.slice(0, end));
    if (bound !== undefined) return bound + name.slice(end);
    end = name.lastIndexOf('.', end - 1);
  }
  return name;
}

/**
 * Structural usages of any of `elementNames` in one parsed file
 */
export function scanTree(
  filePath: string,
  root: Parser.SyntaxNode,
  lines: readonly string[],
  elementNames: readonly string[]
): UsageLocation[] {
  const walker = new UsageWalker(filePath, lines, elementNames);
  walker.visit(root);
  return walker.found;
}
