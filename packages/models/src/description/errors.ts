import type { ZodError } from 'zod';
import type { NodeKind, TreePath } from '../tree/node.js';

/**
 * Render a tree path as `workflows[0].steps[1].stepId`
 */
export function formatPath(path: TreePath): string {
  if (path.length === 0) {
    return '<root>';
  }

  return path.reduce<string>((acc, segment) => {
    if (typeof segment === 'number') {
      return `${acc}[${segment}]`;
    }
    return acc.length === 0 ? segment : `${acc}.${segment}`;
  }, '');
}

export type ArazzoErrorKind =
  | 'ShapeMismatch'
  | 'MissingField'
  | 'TypeMismatch'
  | 'AmbiguousOrInvalidUnion'
  | 'DuplicateIdentifier'
  | 'DanglingReference'
  | 'UnsupportedVersion'
  | 'InvalidValue';

/**
 * Base error for every failure while building or resolving a description.
 */
export abstract class ArazzoError extends Error {
  abstract readonly kind: ArazzoErrorKind;

  constructor(
    message: string,
    public readonly path: TreePath
  ) {
    super(`${message} (at ${formatPath(path)})`);
    this.name = 'ArazzoError';
  }
}

/**
 * A node is not the kind a field requires.
 */
export class ShapeMismatchError extends ArazzoError {
  readonly kind = 'ShapeMismatch';

  constructor(
    path: TreePath,
    public readonly expectedKind: NodeKind,
    public readonly actualKind: NodeKind
  ) {
    super(`Expected ${expectedKind}, got ${actualKind}`, path);
    this.name = 'ShapeMismatchError';
  }
}

export class MissingFieldError extends ArazzoError {
  readonly kind = 'MissingField';

  constructor(
    path: TreePath,
    public readonly key: string
  ) {
    super(`Missing required field "${key}"`, path);
    this.name = 'MissingFieldError';
  }
}

/**
 * A field is present but holds the wrong scalar type.
 */
export class TypeMismatchError extends ArazzoError {
  readonly kind = 'TypeMismatch';

  constructor(
    path: TreePath,
    public readonly key: string,
    public readonly expected: NodeKind,
    public readonly actual: NodeKind
  ) {
    super(`Field "${key}" must be a ${expected}, got ${actual}`, path);
    this.name = 'TypeMismatchError';
  }
}

/**
 * A polymorphic field matched none, or more than one, of its candidate shapes.
 */
export class AmbiguousOrInvalidUnionError extends ArazzoError {
  readonly kind = 'AmbiguousOrInvalidUnion';

  constructor(
    path: TreePath,
    public readonly candidates: readonly string[],
    detail: string
  ) {
    super(`${detail}. Candidates: ${candidates.join(', ')}`, path);
    this.name = 'AmbiguousOrInvalidUnionError';
  }
}

/**
 * Two entries of one list share a stepId, workflowId or name.
 * `identifier` carries that repeated value; `name` stays the error class
 * name as on every Error.
 */
export class DuplicateIdentifierError extends ArazzoError {
  readonly kind = 'DuplicateIdentifier';

  constructor(
    path: TreePath,
    /** The repeated stepId, workflowId or name */
    public readonly identifier: string
  ) {
    super(`Duplicate identifier "${identifier}"`, path);
    this.name = 'DuplicateIdentifierError';
  }
}

/**
 * A reusable object reference does not point at a declared component.
 */
export class DanglingReferenceError extends ArazzoError {
  readonly kind = 'DanglingReference';

  constructor(
    path: TreePath,
    public readonly reference: string,
    public readonly expectedKind: string
  ) {
    super(
      `Reference "${reference}" does not resolve to a component in "${expectedKind}"`,
      path
    );
    this.name = 'DanglingReferenceError';
  }
}

export class UnsupportedVersionError extends ArazzoError {
  readonly kind = 'UnsupportedVersion';

  constructor(
    path: TreePath,
    public readonly found: string,
    public readonly supported: readonly string[]
  ) {
    super(
      `Unsupported Arazzo version "${found}". Supported versions: ${supported.join(', ')}`,
      path
    );
    this.name = 'UnsupportedVersionError';
  }
}

/**
 * A field has the right type but a value outside its allowed domain.
 */
export class InvalidValueError extends ArazzoError {
  readonly kind = 'InvalidValue';

  constructor(
    path: TreePath,
    public readonly key: string,
    public readonly value: unknown,
    public readonly reason: string
  ) {
    super(`Invalid value for "${key}": ${reason}`, path);
    this.name = 'InvalidValueError';
  }
}

/**
 * Error class for description loading errors (I/O or text parsing)
 */
export class DescriptionLoadError extends Error {
  constructor(
    message: string,
    public readonly cause?: unknown
  ) {
    super(message);
    this.name = 'DescriptionLoadError';
  }
}

export class ParseOptionsValidationError extends Error {
  constructor(
    message: string,
    public readonly validationErrors: ZodError
  ) {
    super(message);
    this.name = 'ParseOptionsValidationError';
  }
}
