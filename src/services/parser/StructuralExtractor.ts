/**
 * Structural Extractor
 *
 * Builds the StructuralModel of one Python file: top-level functions, classes
 * with their direct methods, every import in the file, and names assigned at
 * module scope. Nested definitions are not modeled.
 */

import type Parser from 'tree-sitter';
import { Result, ok, err } from '../../lib/result-types.js';
import type { ParseError } from '../../lib/errors/DetectorErrors.js';
import {
  createEmptyModel,
  createStructuralModel,
  type ClassDescriptor,
  type FunctionSignature,
  type ImportDescriptor,
  type StructuralModel,
} from '../../models/StructuralModel.js';
import { TreeSitterParser } from './TreeSitterParser.js';
import { extractFunctionSignature } from './FunctionExtractor.js';
import { extractImports } from './ImportExtractor.js';
import { codeChildren, lineOf, unwrapDefinition } from './node-utils.js';

export class StructuralExtractor {
  private readonly parser: TreeSitterParser;

  constructor(parser: TreeSitterParser = new TreeSitterParser()) {
    this.parser = parser;
  }

  /**
   * Extract the structural model of one revision of one file
   *
   * @param source - File text; empty or whitespace-only yields the empty model
   * @param filePath - Used in error messages only
   */
  extract(source: string, filePath: string): Result<StructuralModel, ParseError> {
    if (source.trim() === '') {
      return ok(createEmptyModel());
    }

    const parsed = this.parser.parse(source, filePath);
    if (parsed.isErr()) {
      return err(parsed.error);
    }

    return ok(buildModel(parsed.value.rootNode));
  }
}

function buildModel(root: Parser.SyntaxNode): StructuralModel {
  const functions = new Map<string, FunctionSignature>();
  const classes = new Map<string, ClassDescriptor>();
  const variables = new Set<string>();

  for (const statement of codeChildren(root)) {
    const { definition, decorators } = unwrapDefinition(statement);

    switch (definition.type) {
      case 'function_definition': {
        const signature = extractFunctionSignature(definition, decorators);
        functions.set(signature.name, signature);
        break;
      }
      case 'class_definition': {
        const descriptor = extractClass(definition, decorators);
        classes.set(descriptor.name, descriptor);
        break;
      }
      case 'expression_statement':
        collectAssignedNames(definition, variables);
        break;
      default:
        break;
    }
  }

  const imports = new Map<string, ImportDescriptor>();
  for (const descriptor of extractImports(root)) {
    for (const name of descriptor.importedNames) {
      imports.set(name, descriptor);
    }
  }

  return createStructuralModel({ functions, classes, imports, moduleLevelVariableNames: variables });
}

function extractClass(node: Parser.SyntaxNode, decorators: string[]): ClassDescriptor {
  const name = node.childForFieldName('name')?.text ?? '<anonymous>';
  const superclasses = node.childForFieldName('superclasses');
  const bases = superclasses
    ? codeChildren(superclasses)
        .filter(c => c.type !== 'keyword_argument')
        .map(c => c.text)
    : [];

  const methods = new Map<string, FunctionSignature>();
  const body = node.childForFieldName('body');
  if (body) {
    for (const member of codeChildren(body)) {
      const unwrapped = unwrapDefinition(member);
      if (unwrapped.definition.type !== 'function_definition') continue;
      const method = extractFunctionSignature(unwrapped.definition, unwrapped.decorators, name);
      methods.set(method.name, method);
    }
  }

  return Object.freeze({ name, bases, decorators, line: lineOf(node), methods });
}

/**
 * `a = b = 1` binds both a and b; tuple targets and attributes are ignored
 */
function collectAssignedNames(statement: Parser.SyntaxNode, into: Set<string>): void {
  let assignment: Parser.SyntaxNode | null | undefined = codeChildren(statement)[0];
  while (assignment && assignment.type === 'assignment') {
    const left = assignment.childForFieldName('left');
    if (left && left.type === 'identifier') {
      into.add(left.text);
    }
    assignment = assignment.childForFieldName('right');
  }
}

/**
 * Extract with a throwaway extractor
 */
export function extractStructure(source: string, filePath: string): Result<StructuralModel, ParseError> {
  return new StructuralExtractor().extract(source, filePath);
}
