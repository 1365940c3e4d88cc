/**
 * Signature Formatting
 *
 * Renders callables and classes the way they are shown in change records:
 * `name(p1: T1 = d1, p2, *args, **kwargs) -> R`. Only annotations and
 * defaults that exist are rendered.
 */

import type { ClassDescriptor, FunctionSignature } from '../../models/StructuralModel.js';

export function formatFunctionSignature(signature: FunctionSignature): string {
  const params = signature.parameters.map(name => {
    let rendered = name;
    const annotation = signature.annotations.get(name);
    if (annotation !== undefined) rendered += `: ${annotation}`;
    const defaultValue = signature.defaults.get(name);
    if (defaultValue !== undefined) rendered += ` = ${defaultValue}`;
    return rendered;
  });

  if (signature.vararg !== undefined) params.push(`*${signature.vararg}`);
  if (signature.kwarg !== undefined) params.push(`**${signature.kwarg}`);

  const returns = signature.returnAnnotation !== undefined ? ` -> ${signature.returnAnnotation}` : '';
  return `${signature.name}(${params.join(', ')})${returns}`;
}

export function formatClassSignature(descriptor: ClassDescriptor): string {
  return descriptor.bases.length > 0
    ? `class ${descriptor.name}(${descriptor.bases.join(', ')})`
    : `class ${descriptor.name}`;
}
