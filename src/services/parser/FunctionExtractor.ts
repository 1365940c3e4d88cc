/**
 * Function Signature Extraction
 *
 * Turns a `function_definition` node into a FunctionSignature. Defaults and
 * annotations keep the literal source text, so `0` and `0.0` compare as
 * different defaults.
 */

import type Parser from 'tree-sitter';
import type { FunctionSignature } from '../../models/StructuralModel.js';
import { codeChildren, lineOf } from './node-utils.js';

interface ParameterState {
  parameters: string[];
  defaults: Map<string, string>;
  annotations: Map<string, string>;
  vararg?: string;
  kwarg?: string;
  /** Set after `*` or `*args`; later parameters are keyword-only and not modeled */
  keywordOnly: boolean;
}

/**
 * Extract a signature from a function_definition node
 *
 * @param node - function_definition (already unwrapped from decorated_definition)
 * @param decorators - Decorator texts in declaration order
 * @param owningClass - Class whose body directly contains the definition
 */
export function extractFunctionSignature(
  node: Parser.SyntaxNode,
  decorators: string[],
  owningClass?: string
): FunctionSignature {
  const name = node.childForFieldName('name')?.text ?? '<anonymous>';
  const state: ParameterState = {
    parameters: [],
    defaults: new Map(),
    annotations: new Map(),
    keywordOnly: false,
  };

  const parametersNode = node.childForFieldName('parameters');
  if (parametersNode) {
    for (const param of codeChildren(parametersNode)) {
      visitParameter(param, state);
    }
  }

  const returnType = node.childForFieldName('return_type');

  return Object.freeze({
    name,
    parameters: state.parameters,
    defaults: state.defaults,
    vararg: state.vararg,
    kwarg: state.kwarg,
    annotations: state.annotations,
    returnAnnotation: returnType ? returnType.text : undefined,
    decorators,
    isAsync: node.children.some(c => c.type === 'async'),
    isMethod: owningClass !== undefined,
    owningClass,
    line: lineOf(node),
  });
}

function visitParameter(param: Parser.SyntaxNode, state: ParameterState): void {
  switch (param.type) {
    case 'identifier':
      addPositional(state, param.text);
      break;

    case 'typed_parameter': {
      const inner = codeChildren(param)[0];
      const type = param.childForFieldName('type');
      if (!inner) break;
      const boundName = visitSplatOrName(inner, state);
      if (boundName && type) {
        state.annotations.set(boundName, type.text);
      }
      break;
    }

    case 'default_parameter':
    case 'typed_default_parameter': {
      const nameNode = param.childForFieldName('name');
      const value = param.childForFieldName('value');
      const type = param.childForFieldName('type');
      if (!nameNode || state.keywordOnly) break;
      addPositional(state, nameNode.text);
      if (value) state.defaults.set(nameNode.text, value.text);
      if (type) state.annotations.set(nameNode.text, type.text);
      break;
    }

    case 'list_splat_pattern':
    case 'dictionary_splat_pattern':
      visitSplatOrName(param, state);
      break;

    case 'keyword_separator':
      state.keywordOnly = true;
      break;

    // positional_separator (`/`) changes nothing for positional callers
    default:
      break;
  }
}

/**
 * Record a bare name, *args or **kwargs; returns the name when it is modeled
 */
function visitSplatOrName(node: Parser.SyntaxNode, state: ParameterState): string | undefined {
  if (node.type === 'list_splat_pattern') {
    const id = codeChildren(node)[0];
    state.keywordOnly = true;
    if (!id) return undefined;
    state.vararg = id.text;
    return id.text;
  }
  if (node.type === 'dictionary_splat_pattern') {
    const id = codeChildren(node)[0];
    if (!id) return undefined;
    state.kwarg = id.text;
    return id.text;
  }
  if (node.type === 'identifier' && !state.keywordOnly) {
    addPositional(state, node.text);
    return node.text;
  }
  return undefined;
}

function addPositional(state: ParameterState, name: string): void {
  if (state.keywordOnly) return;
  state.parameters.push(name);
}
