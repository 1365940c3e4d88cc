import type Parser from 'tree-sitter';

/**
 * 1-based line of a node's first character
 */
export const lineOf = (node: Parser.SyntaxNode): number => node.startPosition.row + 1;

/**
 * Node wrappers are not reused between calls, so compare by span and type
 */
export const isSameNode = (a: Parser.SyntaxNode | null, b: Parser.SyntaxNode | null): boolean => {
  if (!a || !b) return false;
  return a.startIndex === b.startIndex && a.endIndex === b.endIndex && a.type === b.type;
};

/**
 * Named children that carry code (comments are extras and can appear anywhere)
 */
export const codeChildren = (node: Parser.SyntaxNode): Parser.SyntaxNode[] =>
  node.namedChildren.filter(c => c.type !== 'comment');

/**
 * Text of a decorator without the leading @
 */
export const decoratorText = (decorator: Parser.SyntaxNode): string => {
  const expression = codeChildren(decorator)[0];
  return expression ? expression.text : decorator.text.replace(/^@\s*/, '');
};

/**
 * Unwrap `@decorator` wrappers to the definition they decorate
 */
export const unwrapDefinition = (
  node: Parser.SyntaxNode
): { definition: Parser.SyntaxNode; decorators: string[] } => {
  if (node.type !== 'decorated_definition') {
    return { definition: node, decorators: [] };
  }
  const decorators = node.namedChildren.filter(c => c.type === 'decorator').map(decoratorText);
  const definition = node.childForFieldName('definition') ?? node;
  return { definition, decorators };
};
