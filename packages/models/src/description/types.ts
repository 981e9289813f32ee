/**
 * TypeScript types for the Arazzo description object model.
 * Enumerations are inferred from the Zod schemas; entities are plain readonly
 * values built by the entity builders.
 */

import type { z } from 'zod';
import type { JsonArray, JsonObject, JsonValue } from '../tree/node.js';
import type {
  ComponentKindSchema,
  CriterionExpressionTypeNameSchema,
  CriterionTypeSchema,
  FailureActionTypeSchema,
  ParameterLocationSchema,
  ParseOptionsSchema,
  SourceDescriptionTypeSchema,
  SuccessActionTypeSchema,
} from './schema.js';

// Enumerations
export type SourceDescriptionType = z.infer<typeof SourceDescriptionTypeSchema>;
export type ParameterLocation = z.infer<typeof ParameterLocationSchema>;
export type CriterionType = z.infer<typeof CriterionTypeSchema>;
export type CriterionExpressionTypeName = z.infer<
  typeof CriterionExpressionTypeNameSchema
>;
export type SuccessActionType = z.infer<typeof SuccessActionTypeSchema>;
export type FailureActionType = z.infer<typeof FailureActionTypeSchema>;
export type ComponentKind = z.infer<typeof ComponentKindSchema>;

// Options
export type ParseOptions = z.input<typeof ParseOptionsSchema>;
export type ResolvedParseOptions = z.output<typeof ParseOptionsSchema>;

/** Vendor extension keys (`x-...`) mapped to their untouched values */
export type ExtensionKey = `x-${string}`;
export type Extensions = Readonly<Record<ExtensionKey, JsonValue>>;

/** Runtime expressions by output name */
export type Outputs = Readonly<Record<string, string>>;

// Payloads
export interface ScalarPayload {
  readonly kind: 'scalar';
  readonly value: string | number | boolean | null;
}

export interface StructuredPayload {
  readonly kind: 'structured';
  readonly value: JsonObject | JsonArray;
}

export interface ExpressionPayload {
  readonly kind: 'expression';
  readonly expression: string;
}

/**
 * A literal scalar, a structured fragment or a runtime expression.
 * Used for request body payloads, parameter values and replacement values.
 */
export type Payload = ScalarPayload | StructuredPayload | ExpressionPayload;

export interface PayloadReplacement {
  /** JSON Pointer or XPath into the payload */
  readonly target: string;
  readonly value: Payload;
  readonly extensions: Extensions;
}

export interface RequestBody {
  readonly contentType: string;
  readonly payload?: Payload;
  readonly replacements: readonly PayloadReplacement[];
  readonly extensions: Extensions;
}

// Reusable objects
export type ReferenceTargetKind = Exclude<ComponentKind, 'inputs'>;

export interface ReusableObject {
  readonly kind: 'reference';
  /** `$components.<kind>.<name>` */
  readonly reference: string;
  readonly targetKind: ReferenceTargetKind;
  /** Overrides the referenced parameter's value */
  readonly value?: Payload;
}

export interface Parameter {
  readonly kind: 'parameter';
  readonly name: string;
  readonly in?: ParameterLocation;
  readonly value: Payload;
  readonly extensions: Extensions;
}

export type ParameterOrReference = Parameter | ReusableObject;

// Criteria
export interface CriterionExpressionType {
  readonly type: CriterionExpressionTypeName;
  readonly version: string;
  readonly extensions: Extensions;
}

export interface Criterion {
  readonly condition: string;
  readonly context?: string;
  /** Absent means `simple` */
  readonly type?: CriterionType | CriterionExpressionType;
  readonly extensions: Extensions;
}

// Actions
export type ActionTarget =
  | { readonly kind: 'step'; readonly stepId: string }
  | { readonly kind: 'workflow'; readonly workflowId: string };

interface ActionBase {
  readonly name: string;
  readonly criteria: readonly Criterion[];
  readonly extensions: Extensions;
}

export type SuccessAction = ActionBase & { readonly kind: 'successAction' } & (
    | { readonly type: 'end' }
    | { readonly type: 'goto'; readonly target: ActionTarget }
  );

export type FailureAction = ActionBase & { readonly kind: 'failureAction' } & (
    | { readonly type: 'end' }
    | { readonly type: 'goto'; readonly target: ActionTarget }
    | {
        readonly type: 'retry';
        /** Seconds to wait before retrying */
        readonly retryAfter: number;
        readonly retryLimit: number;
        readonly target?: ActionTarget;
      }
  );

export type SuccessActionOrReference = SuccessAction | ReusableObject;
export type FailureActionOrReference = FailureAction | ReusableObject;

// Steps
export type OperationReference =
  | { readonly kind: 'operationId'; readonly operationId: string }
  | { readonly kind: 'operationPath'; readonly operationPath: string }
  | { readonly kind: 'workflowId'; readonly workflowId: string };

export interface Step {
  readonly stepId: string;
  readonly description?: string;
  readonly operation: OperationReference;
  readonly parameters: readonly ParameterOrReference[];
  readonly requestBody?: RequestBody;
  readonly successCriteria: readonly Criterion[];
  readonly onSuccess: readonly SuccessActionOrReference[];
  readonly onFailure: readonly FailureActionOrReference[];
  readonly outputs: Outputs;
  readonly extensions: Extensions;
}

export interface Workflow {
  readonly workflowId: string;
  readonly summary?: string;
  readonly description?: string;
  /** JSON Schema of the workflow inputs */
  readonly inputs?: JsonValue;
  readonly dependsOn: readonly string[];
  readonly parameters: readonly ParameterOrReference[];
  readonly steps: readonly Step[];
  readonly successActions: readonly SuccessActionOrReference[];
  readonly failureActions: readonly FailureActionOrReference[];
  readonly outputs: Outputs;
  readonly extensions: Extensions;
}

export interface Info {
  readonly title: string;
  readonly summary?: string;
  readonly description?: string;
  readonly version: string;
  readonly extensions: Extensions;
}

export interface SourceDescription {
  readonly name: string;
  readonly url: string;
  readonly type?: SourceDescriptionType;
  readonly extensions: Extensions;
}

export interface Components {
  /** Reusable input schemas and payload templates */
  readonly inputs: Readonly<Record<string, JsonValue>>;
  readonly parameters: Readonly<Record<string, Parameter>>;
  readonly successActions: Readonly<Record<string, SuccessAction>>;
  readonly failureActions: Readonly<Record<string, FailureAction>>;
  readonly extensions: Extensions;
}

/**
 * Root of an Arazzo document
 */
export interface Description {
  /** Arazzo format version, such as 1.0.1 */
  readonly arazzo: string;
  readonly info: Info;
  readonly sourceDescriptions: readonly SourceDescription[];
  readonly workflows: readonly Workflow[];
  readonly components?: Components;
  readonly extensions: Extensions;
}

// Type guards
export function isReusableObject(
  value: ParameterOrReference | SuccessActionOrReference | FailureActionOrReference
): value is ReusableObject {
  return value.kind === 'reference';
}

export function isExpressionPayload(
  payload: Payload
): payload is ExpressionPayload {
  return payload.kind === 'expression';
}
