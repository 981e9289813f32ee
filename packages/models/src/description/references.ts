/**
 * Structural resolution of reusable object references against the
 * components section. References are checked, never dereferenced.
 */
import type { TreePath } from '../tree/node.js';
import { logDebug } from '../log.js';
import { DanglingReferenceError } from './errors.js';
import { ComponentReferenceSchema } from './schema.js';
import type {
  Components,
  Description,
  FailureActionOrReference,
  ParameterOrReference,
  ReferenceTargetKind,
  ReusableObject,
  SuccessActionOrReference,
} from './types.js';

const COMPONENTS_PREFIX = '$components.';

export interface ComponentReference {
  readonly kind: ReferenceTargetKind;
  readonly name: string;
}

export interface LocatedReference {
  readonly reference: ReusableObject;
  readonly path: TreePath;
}

/**
 * Split `$components.<kind>.<name>` into its kind and name
 */
export function parseComponentReference(
  reference: string
): ComponentReference | undefined {
  if (!ComponentReferenceSchema.safeParse(reference).success) {
    return undefined;
  }

  const rest = reference.slice(COMPONENTS_PREFIX.length);
  const separator = rest.indexOf('.');
  const kind = rest.slice(0, separator);
  const name = rest.slice(separator + 1);

  switch (kind) {
    case 'parameters':
    case 'successActions':
    case 'failureActions':
      return { kind, name };
    default:
      return undefined;
  }
}

type Referencing =
  | ParameterOrReference
  | SuccessActionOrReference
  | FailureActionOrReference;

function collect(
  items: readonly Referencing[],
  path: TreePath
): LocatedReference[] {
  return items.flatMap((item, index) =>
    item.kind === 'reference'
      ? [{ reference: item, path: [...path, index] }]
      : []
  );
}

/**
 * Every reusable object in the description, with its document path
 */
export function collectReferences(
  description: Description
): LocatedReference[] {
  return description.workflows.flatMap((workflow, workflowIndex) => {
    const base = ['workflows', workflowIndex];
    return [
      ...collect(workflow.parameters, [...base, 'parameters']),
      ...workflow.steps.flatMap((step, stepIndex) => {
        const stepPath = [...base, 'steps', stepIndex];
        return [
          ...collect(step.parameters, [...stepPath, 'parameters']),
          ...collect(step.onSuccess, [...stepPath, 'onSuccess']),
          ...collect(step.onFailure, [...stepPath, 'onFailure']),
        ];
      }),
      ...collect(workflow.successActions, [...base, 'successActions']),
      ...collect(workflow.failureActions, [...base, 'failureActions']),
    ];
  });
}

function isDeclared(
  components: Components | undefined,
  target: ComponentReference
): boolean {
  return (
    components !== undefined && Object.hasOwn(components[target.kind], target.name)
  );
}

/**
 * @throws {DanglingReferenceError} For the first reference that does not
 * name a component of the expected kind
 */
export function resolveReferences(description: Description): void {
  const references = collectReferences(description);
  logDebug('resolve', `checking ${references.length} reference(s)`);

  for (const { reference, path } of references) {
    const target = parseComponentReference(reference.reference);
    if (
      !target ||
      target.kind !== reference.targetKind ||
      !isDeclared(description.components, target)
    ) {
      throw new DanglingReferenceError(
        [...path, 'reference'],
        reference.reference,
        reference.targetKind
      );
    }
  }
}
