/**
 * Signature Differ
 *
 * Compares the structural models of two revisions of one file and reports
 * removed elements and incompatible signature changes. Pure: no I/O, no
 * state between calls.
 *
 * A parameter that only exists in the new revision is not reported, even a
 * required one inserted before existing parameters. Such an insertion only
 * shows up when it also reorders surviving parameters.
 */

import { ChangeKind, REMOVED_SIGNATURE, createChangeRecord, type ChangeRecord, type Severity } from '../../models/ChangeRecord.js';
import type { FunctionSignature, StructuralModel } from '../../models/StructuralModel.js';
import { formatClassSignature, formatFunctionSignature } from './SignatureFormatter.js';

/**
 * One signature difference before it is placed in a file and element
 */
export interface SignatureChange {
  kind: ChangeKind;
  description: string;
  severity: Severity;
}

/**
 * Diff two models of the same logical file
 */
export function diffModels(oldModel: StructuralModel, newModel: StructuralModel, filePath: string): ChangeRecord[] {
  return [
    ...checkRemovedFunctions(oldModel, newModel, filePath),
    ...checkFunctionSignatureChanges(oldModel, newModel, filePath),
    ...checkRemovedClasses(oldModel, newModel, filePath),
    ...checkClassMethodChanges(oldModel, newModel, filePath),
    ...checkImportChanges(oldModel, newModel, filePath),
  ];
}

function checkRemovedFunctions(oldModel: StructuralModel, newModel: StructuralModel, filePath: string): ChangeRecord[] {
  const records: ChangeRecord[] = [];
  for (const [name, signature] of oldModel.functions) {
    if (newModel.functions.has(name)) continue;
    records.push(createChangeRecord({
      kind: ChangeKind.FUNCTION_REMOVED,
      filePath,
      line: signature.line,
      elementName: name,
      oldSignatureText: formatFunctionSignature(signature),
      newSignatureText: REMOVED_SIGNATURE,
      description: `Function '${name}' was removed`,
      severity: 'high',
    }));
  }
  return records;
}

function checkFunctionSignatureChanges(oldModel: StructuralModel, newModel: StructuralModel, filePath: string): ChangeRecord[] {
  const records: ChangeRecord[] = [];
  for (const [name, oldSignature] of oldModel.functions) {
    const newSignature = newModel.functions.get(name);
    if (!newSignature) continue;

    for (const change of compareSignatures(oldSignature, newSignature)) {
      records.push(createChangeRecord({
        ...change,
        filePath,
        line: newSignature.line,
        elementName: name,
        oldSignatureText: formatFunctionSignature(oldSignature),
        newSignatureText: formatFunctionSignature(newSignature),
      }));
    }
  }
  return records;
}

function checkRemovedClasses(oldModel: StructuralModel, newModel: StructuralModel, filePath: string): ChangeRecord[] {
  const records: ChangeRecord[] = [];
  for (const [name, descriptor] of oldModel.classes) {
    if (newModel.classes.has(name)) continue;
    records.push(createChangeRecord({
      kind: ChangeKind.CLASS_REMOVED,
      filePath,
      line: descriptor.line,
      elementName: name,
      oldSignatureText: formatClassSignature(descriptor),
      newSignatureText: REMOVED_SIGNATURE,
      description: `Class '${name}' was removed`,
      severity: 'high',
    }));
  }
  return records;
}

function checkClassMethodChanges(oldModel: StructuralModel, newModel: StructuralModel, filePath: string): ChangeRecord[] {
  const records: ChangeRecord[] = [];

  for (const [className, oldClass] of oldModel.classes) {
    const newClass = newModel.classes.get(className);
    if (!newClass) continue;

    for (const [methodName, method] of oldClass.methods) {
      if (newClass.methods.has(methodName)) continue;
      records.push(createChangeRecord({
        kind: ChangeKind.METHOD_REMOVED,
        filePath,
        line: method.line,
        elementName: `${className}.${methodName}`,
        oldSignatureText: formatFunctionSignature(method),
        newSignatureText: REMOVED_SIGNATURE,
        description: `Method '${methodName}' was removed from class '${className}'`,
        severity: 'high',
      }));
    }

    for (const [methodName, oldMethod] of oldClass.methods) {
      const newMethod = newClass.methods.get(methodName);
      if (!newMethod) continue;

      for (const change of compareSignatures(oldMethod, newMethod)) {
        records.push(createChangeRecord({
          ...change,
          description: `Method '${methodName}' in class '${className}': ${change.description}`,
          filePath,
          line: newMethod.line,
          elementName: `${className}.${methodName}`,
          oldSignatureText: formatFunctionSignature(oldMethod),
          newSignatureText: formatFunctionSignature(newMethod),
        }));
      }
    }
  }

  return records;
}

/**
 * Reserved for changes to re-exported names; import edits alone are not
 * part of the public surface
 */
function checkImportChanges(_oldModel: StructuralModel, _newModel: StructuralModel, _filePath: string): ChangeRecord[] {
  return [];
}

/**
 * Differences between two versions of one callable, in report order
 */
export function compareSignatures(oldSignature: FunctionSignature, newSignature: FunctionSignature): SignatureChange[] {
  const changes: SignatureChange[] = [];
  const newParams = new Set(newSignature.parameters);
  const shared = oldSignature.parameters.filter(p => newParams.has(p));

  for (const param of oldSignature.parameters) {
    if (!newParams.has(param)) {
      changes.push({
        kind: ChangeKind.PARAMETER_REMOVED,
        description: `Parameter '${param}' was removed`,
        severity: 'high',
      });
    }
  }

  const sharedSet = new Set(shared);
  const newOrder = newSignature.parameters.filter(p => sharedSet.has(p));
  if (shared.some((param, index) => newOrder[index] !== param)) {
    changes.push({
      kind: ChangeKind.SIGNATURE_REORDERED,
      description: 'Parameter order changed',
      severity: 'high',
    });
  }

  for (const param of shared) {
    const oldDefault = oldSignature.defaults.get(param);
    const newDefault = newSignature.defaults.get(param);

    if (oldDefault !== undefined && newDefault === undefined) {
      changes.push({
        kind: ChangeKind.PARAMETER_BECAME_REQUIRED,
        description: `Parameter '${param}' became required (default value removed)`,
        severity: 'high',
      });
    } else if (oldDefault === undefined && newDefault !== undefined) {
      changes.push({
        kind: ChangeKind.PARAMETER_BECAME_OPTIONAL,
        description: `Parameter '${param}' became optional (default value added)`,
        severity: 'low',
      });
    } else if (oldDefault !== undefined && newDefault !== undefined && oldDefault !== newDefault) {
      changes.push({
        kind: ChangeKind.DEFAULT_VALUE_CHANGED,
        description: `Default value for parameter '${param}' changed from '${oldDefault}' to '${newDefault}'`,
        severity: 'medium',
      });
    }
  }

  const returnChange = compareReturnAnnotations(oldSignature.returnAnnotation, newSignature.returnAnnotation);
  if (returnChange) changes.push(returnChange);

  const annotated: string[] = [...shared];
  if (oldSignature.vararg !== undefined && oldSignature.vararg === newSignature.vararg) {
    annotated.push(oldSignature.vararg);
  }
  if (oldSignature.kwarg !== undefined && oldSignature.kwarg === newSignature.kwarg) {
    annotated.push(oldSignature.kwarg);
  }

  for (const param of annotated) {
    const change = compareParamAnnotations(
      param,
      oldSignature.annotations.get(param),
      newSignature.annotations.get(param)
    );
    if (change) changes.push(change);
  }

  return changes;
}

function compareReturnAnnotations(oldType: string | undefined, newType: string | undefined): SignatureChange | undefined {
  if (oldType === newType) return undefined;

  if (oldType !== undefined && newType !== undefined) {
    return {
      kind: ChangeKind.RETURN_TYPE_CHANGED,
      description: `Return type annotation changed from '${oldType}' to '${newType}'`,
      severity: 'medium',
    };
  }
  if (oldType !== undefined) {
    return { kind: ChangeKind.RETURN_TYPE_REMOVED, description: 'Return type annotation removed', severity: 'low' };
  }
  return {
    kind: ChangeKind.RETURN_TYPE_ADDED,
    description: `Return type annotation added: '${newType ?? ''}'`,
    severity: 'low',
  };
}

function compareParamAnnotations(
  param: string,
  oldType: string | undefined,
  newType: string | undefined
): SignatureChange | undefined {
  if (oldType === newType) return undefined;

  if (oldType !== undefined && newType !== undefined) {
    return {
      kind: ChangeKind.PARAM_ANNOTATION_CHANGED,
      description: `Type annotation for parameter '${param}' changed from '${oldType}' to '${newType}'`,
      severity: 'medium',
    };
  }
  if (oldType !== undefined) {
    return {
      kind: ChangeKind.PARAM_ANNOTATION_REMOVED,
      description: `Type annotation for parameter '${param}' removed`,
      severity: 'low',
    };
  }
  return {
    kind: ChangeKind.PARAM_ANNOTATION_ADDED,
    description: `Type annotation for parameter '${param}' added: '${newType ?? ''}'`,
    severity: 'low',
  };
}
