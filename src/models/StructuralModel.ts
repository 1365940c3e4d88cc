/**
 * Structural Model
 *
 * Language-stripped description of the public surface of one Python file at
 * one revision: module-level functions, classes with their direct methods,
 * imports and module-level variable names.
 *
 * A file missing from a revision is represented by the empty model so that
 * comparison has a single code path.
 */

/**
 * Marker stored in ImportDescriptor.importedNames for `from x import *`
 */
export const WILDCARD_IMPORT = '*';

/**
 * One callable (function or method)
 */
export interface FunctionSignature {
  readonly name: string;
  /** Positional parameter names in declaration order, self/cls included */
  readonly parameters: readonly string[];
  /** Parameter name to the literal source text of its default expression */
  readonly defaults: ReadonlyMap<string, string>;
  /** Name bound to *args */
  readonly vararg?: string;
  /** Name bound to **kwargs */
  readonly kwarg?: string;
  /** Literal annotation text; keys are parameters, vararg or kwarg names */
  readonly annotations: ReadonlyMap<string, string>;
  readonly returnAnnotation?: string;
  /** Decorator expressions as written, without the leading @ */
  readonly decorators: readonly string[];
  readonly isAsync: boolean;
  readonly isMethod: boolean;
  readonly owningClass?: string;
  /** 1-based declaration line */
  readonly line: number;
}

export interface ClassDescriptor {
  readonly name: string;
  readonly bases: readonly string[];
  readonly decorators: readonly string[];
  readonly line: number;
  /** Direct methods by name; a redeclared name keeps the later definition */
  readonly methods: ReadonlyMap<string, FunctionSignature>;
}

export interface ImportDescriptor {
  /** Source module of a from-import; empty for plain `import x` */
  readonly module: string;
  readonly importedNames: readonly string[];
  /** Original name to alias */
  readonly aliases: ReadonlyMap<string, string>;
  readonly isFromImport: boolean;
  readonly line: number;
}

export interface StructuralModel {
  readonly functions: ReadonlyMap<string, FunctionSignature>;
  readonly classes: ReadonlyMap<string, ClassDescriptor>;
  /** Imported name to the statement that imported it */
  readonly imports: ReadonlyMap<string, ImportDescriptor>;
  readonly moduleLevelVariableNames: ReadonlySet<string>;
}

/**
 * Freeze a freshly extracted model
 */
export function createStructuralModel(parts: {
  functions: Map<string, FunctionSignature>;
  classes: Map<string, ClassDescriptor>;
  imports: Map<string, ImportDescriptor>;
  moduleLevelVariableNames: Set<string>;
}): StructuralModel {
  return Object.freeze({
    functions: parts.functions,
    classes: parts.classes,
    imports: parts.imports,
    moduleLevelVariableNames: parts.moduleLevelVariableNames,
  });
}

/**
 * Model for an absent, empty or unparsable file
 */
export function createEmptyModel(): StructuralModel {
  return createStructuralModel({
    functions: new Map(),
    classes: new Map(),
    imports: new Map(),
    moduleLevelVariableNames: new Set(),
  });
}

export function isEmptyModel(model: StructuralModel): boolean {
  return (
    model.functions.size === 0 &&
    model.classes.size === 0 &&
    model.imports.size === 0 &&
    model.moduleLevelVariableNames.size === 0
  );
}
