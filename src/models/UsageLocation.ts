/**
 * UsageLocation.ts
 * Places outside the declaring file that appear to reference a changed element
 */

export type UsageKind =
  | 'direct_import'
  | 'module_import'
  | 'qualified_usage'
  | 'function_call'
  | 'class_instantiation'
  | 'attribute_access'
  | 'method_call'
  | 'star_import'
  | 'name_reference';

export interface UsageLocation {
  readonly filePath: string;
  /** 1-based */
  readonly line: number;
  /** Source lines around the match */
  readonly context: string;
  readonly usageKind: UsageKind;
}

/**
 * One way a changed element could be referenced elsewhere
 */
export interface UsagePattern {
  /** Regular expression source, matched line by line */
  readonly source: string;
  readonly elementName: string;
  readonly usageKind: UsageKind;
}

/**
 * Orders locations by file then line; stable for equal keys
 */
export function compareUsageLocations(a: UsageLocation, b: UsageLocation): number {
  if (a.filePath !== b.filePath) {
    return a.filePath < b.filePath ? -1 : 1;
  }
  return a.line - b.line;
}
