/**
 * Reverse emission: the typed model back to plain JSON values.
 *
 * Fields are written in Arazzo field order with extensions last. Absent
 * optional fields and empty model collections produce no entry; payload
 * values are written as they are.
 */
import type { JsonObject, JsonValue } from '../tree/node.js';
import type {
  ActionTarget,
  Components,
  Criterion,
  Description,
  Extensions,
  FailureAction,
  FailureActionOrReference,
  Info,
  OperationReference,
  Parameter,
  ParameterOrReference,
  Payload,
  PayloadReplacement,
  RequestBody,
  ReusableObject,
  SourceDescription,
  Step,
  SuccessAction,
  SuccessActionOrReference,
  Workflow,
} from './types.js';

type Field = readonly [string, JsonValue | undefined];

/**
 * Assemble a map from ordered fields, skipping undefined values, then
 * append the extensions
 */
function object(fields: readonly Field[], extensions?: Extensions): JsonObject {
  const result: JsonObject = {};
  for (const [key, value] of fields) {
    if (value !== undefined) {
      result[key] = value;
    }
  }
  if (extensions) {
    for (const [key, value] of Object.entries(extensions)) {
      result[key] = value;
    }
  }
  return result;
}

function list<T>(
  items: readonly T[],
  emit: (item: T) => JsonValue
): JsonValue[] | undefined {
  return items.length > 0 ? items.map(emit) : undefined;
}

function record<T>(
  entries: Readonly<Record<string, T>>,
  emit: (value: T) => JsonValue
): JsonObject | undefined {
  const names = Object.keys(entries);
  if (names.length === 0) {
    return undefined;
  }
  return Object.fromEntries(
    Object.entries(entries).map(([name, value]): [string, JsonValue] => [
      name,
      emit(value),
    ])
  );
}

const same = <T extends JsonValue>(value: T): T => value;

export function emitPayload(payload: Payload): JsonValue {
  switch (payload.kind) {
    case 'scalar':
    case 'structured':
      return payload.value;
    case 'expression':
      return payload.expression;
  }
}

export function emitReusableObject(reference: ReusableObject): JsonObject {
  return object([
    ['reference', reference.reference],
    ['value', reference.value && emitPayload(reference.value)],
  ]);
}

export function emitParameter(parameter: ParameterOrReference): JsonObject {
  if (parameter.kind === 'reference') {
    return emitReusableObject(parameter);
  }
  return emitInlineParameter(parameter);
}

function emitInlineParameter(parameter: Parameter): JsonObject {
  return object(
    [
      ['name', parameter.name],
      ['in', parameter.in],
      ['value', emitPayload(parameter.value)],
    ],
    parameter.extensions
  );
}

export function emitCriterion(criterion: Criterion): JsonObject {
  const type = criterion.type;
  return object(
    [
      ['context', criterion.context],
      ['condition', criterion.condition],
      [
        'type',
        typeof type === 'object'
          ? object(
              [
                ['type', type.type],
                ['version', type.version],
              ],
              type.extensions
            )
          : type,
      ],
    ],
    criterion.extensions
  );
}

function targetFields(target: ActionTarget | undefined): Field[] {
  if (!target) {
    return [];
  }
  return target.kind === 'workflow'
    ? [['workflowId', target.workflowId]]
    : [['stepId', target.stepId]];
}

function emitSuccessAction(action: SuccessAction): JsonObject {
  return object(
    [
      ['name', action.name],
      ['type', action.type],
      ...targetFields(action.type === 'goto' ? action.target : undefined),
      ['criteria', list(action.criteria, emitCriterion)],
    ],
    action.extensions
  );
}

function emitFailureAction(action: FailureAction): JsonObject {
  const retry: Field[] =
    action.type === 'retry'
      ? [
          ['retryAfter', action.retryAfter],
          ['retryLimit', action.retryLimit],
        ]
      : [];
  return object(
    [
      ['name', action.name],
      ['type', action.type],
      ...targetFields(action.type === 'end' ? undefined : action.target),
      ...retry,
      ['criteria', list(action.criteria, emitCriterion)],
    ],
    action.extensions
  );
}

export function emitSuccessActionOrReference(
  action: SuccessActionOrReference
): JsonObject {
  return action.kind === 'reference'
    ? emitReusableObject(action)
    : emitSuccessAction(action);
}

export function emitFailureActionOrReference(
  action: FailureActionOrReference
): JsonObject {
  return action.kind === 'reference'
    ? emitReusableObject(action)
    : emitFailureAction(action);
}

function emitReplacement(replacement: PayloadReplacement): JsonObject {
  return object(
    [
      ['target', replacement.target],
      ['value', emitPayload(replacement.value)],
    ],
    replacement.extensions
  );
}

export function emitRequestBody(body: RequestBody): JsonObject {
  return object(
    [
      ['contentType', body.contentType],
      ['payload', body.payload && emitPayload(body.payload)],
      ['replacements', list(body.replacements, emitReplacement)],
    ],
    body.extensions
  );
}

function operationField(operation: OperationReference): Field {
  switch (operation.kind) {
    case 'operationId':
      return ['operationId', operation.operationId];
    case 'operationPath':
      return ['operationPath', operation.operationPath];
    case 'workflowId':
      return ['workflowId', operation.workflowId];
  }
}

export function emitStep(step: Step): JsonObject {
  return object(
    [
      ['stepId', step.stepId],
      ['description', step.description],
      operationField(step.operation),
      ['parameters', list(step.parameters, emitParameter)],
      ['requestBody', step.requestBody && emitRequestBody(step.requestBody)],
      ['successCriteria', list(step.successCriteria, emitCriterion)],
      ['onSuccess', list(step.onSuccess, emitSuccessActionOrReference)],
      ['onFailure', list(step.onFailure, emitFailureActionOrReference)],
      ['outputs', record(step.outputs, same)],
    ],
    step.extensions
  );
}

export function emitWorkflow(workflow: Workflow): JsonObject {
  return object(
    [
      ['workflowId', workflow.workflowId],
      ['summary', workflow.summary],
      ['description', workflow.description],
      ['inputs', workflow.inputs],
      ['dependsOn', list(workflow.dependsOn, same)],
      ['steps', list(workflow.steps, emitStep)],
      [
        'successActions',
        list(workflow.successActions, emitSuccessActionOrReference),
      ],
      [
        'failureActions',
        list(workflow.failureActions, emitFailureActionOrReference),
      ],
      ['outputs', record(workflow.outputs, same)],
      ['parameters', list(workflow.parameters, emitParameter)],
    ],
    workflow.extensions
  );
}

function emitInfo(info: Info): JsonObject {
  return object(
    [
      ['title', info.title],
      ['summary', info.summary],
      ['description', info.description],
      ['version', info.version],
    ],
    info.extensions
  );
}

function emitSourceDescription(source: SourceDescription): JsonObject {
  return object(
    [
      ['name', source.name],
      ['url', source.url],
      ['type', source.type],
    ],
    source.extensions
  );
}

export function emitComponents(components: Components): JsonObject {
  return object(
    [
      ['inputs', record(components.inputs, same)],
      ['parameters', record(components.parameters, emitInlineParameter)],
      ['successActions', record(components.successActions, emitSuccessAction)],
      ['failureActions', record(components.failureActions, emitFailureAction)],
    ],
    components.extensions
  );
}

/**
 * Emit a whole description as a plain JSON tree
 */
export function emitDescription(description: Description): JsonObject {
  return object(
    [
      ['arazzo', description.arazzo],
      ['info', emitInfo(description.info)],
      [
        'sourceDescriptions',
        list(description.sourceDescriptions, emitSourceDescription),
      ],
      ['workflows', list(description.workflows, emitWorkflow)],
      [
        'components',
        description.components && emitComponents(description.components),
      ],
    ],
    description.extensions
  );
}
