/**
 * ChangeRecord.ts
 * A breaking (or potentially breaking) difference between two revisions of
 * one callable or class
 */

export enum ChangeKind {
  FUNCTION_REMOVED = 'function_removed',
  METHOD_REMOVED = 'method_removed',
  CLASS_REMOVED = 'class_removed',
  PARAMETER_REMOVED = 'parameter_removed',
  SIGNATURE_REORDERED = 'signature_reordered',
  PARAMETER_BECAME_REQUIRED = 'parameter_became_required',
  PARAMETER_BECAME_OPTIONAL = 'parameter_became_optional',
  DEFAULT_VALUE_CHANGED = 'default_value_changed',
  RETURN_TYPE_CHANGED = 'return_type_changed',
  RETURN_TYPE_ADDED = 'return_type_added',
  RETURN_TYPE_REMOVED = 'return_type_removed',
  PARAM_ANNOTATION_CHANGED = 'param_annotation_changed',
  PARAM_ANNOTATION_ADDED = 'param_annotation_added',
  PARAM_ANNOTATION_REMOVED = 'param_annotation_removed'
}

export type Severity = 'low' | 'medium' | 'high' | 'critical';

/**
 * Most severe first
 */
export const SEVERITY_ORDER: readonly Severity[] = ['critical', 'high', 'medium', 'low'];

export const REMOVED_SIGNATURE = '<removed>';

export interface ChangeRecord {
  readonly kind: ChangeKind;
  readonly filePath: string;
  readonly line: number;
  /** `name` for module-level elements, `Class.method` for methods */
  readonly elementName: string;
  readonly oldSignatureText: string;
  readonly newSignatureText: string;
  readonly description: string;
  readonly severity: Severity;
  /** 0..1; structural findings are certain */
  readonly confidence: number;
  /** Files with detected usages; filled in by the impact coordinator */
  affectedFiles: Set<string>;
}

/**
 * Factory function to create a ChangeRecord
 */
export function createChangeRecord(fields: {
  kind: ChangeKind;
  filePath: string;
  line: number;
  elementName: string;
  oldSignatureText: string;
  newSignatureText: string;
  description: string;
  severity: Severity;
  confidence?: number;
}): ChangeRecord {
  return {
    ...fields,
    confidence: fields.confidence ?? 1.0,
    affectedFiles: new Set()
  };
}

/**
 * Key shared by a change and its usage locations in the impact map
 */
export function impactKey(change: Pick<ChangeRecord, 'filePath' | 'elementName'>): string {
  return `${change.filePath}:${change.elementName}`;
}
