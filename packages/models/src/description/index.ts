export {
  type SourceDescriptionType,
  type ParameterLocation,
  type CriterionType,
  type CriterionExpressionTypeName,
  type SuccessActionType,
  type FailureActionType,
  type ComponentKind,
  type ParseOptions,
  type ResolvedParseOptions,
  type ExtensionKey,
  type Extensions,
  type Outputs,
  type ScalarPayload,
  type StructuredPayload,
  type ExpressionPayload,
  type Payload,
  type PayloadReplacement,
  type RequestBody,
  type ReferenceTargetKind,
  type ReusableObject,
  type Parameter,
  type ParameterOrReference,
  type CriterionExpressionType,
  type Criterion,
  type ActionTarget,
  type SuccessAction,
  type FailureAction,
  type SuccessActionOrReference,
  type FailureActionOrReference,
  type OperationReference,
  type Step,
  type Workflow,
  type Info,
  type SourceDescription,
  type Components,
  type Description,
  isReusableObject,
  isExpressionPayload,
} from './types.js';

export {
  SUPPORTED_ARAZZO_VERSIONS,
  ArazzoVersionSchema,
  EXTENSION_PREFIX,
  SourceDescriptionTypeSchema,
  ParameterLocationSchema,
  CriterionTypeSchema,
  CriterionExpressionTypeNameSchema,
  SuccessActionTypeSchema,
  FailureActionTypeSchema,
  ComponentKeySchema,
  ComponentKindSchema,
  RuntimeExpressionSchema,
  ComponentReferenceSchema,
  ParseOptionsSchema,
} from './schema.js';

export {
  formatPath,
  type ArazzoErrorKind,
  ArazzoError,
  ShapeMismatchError,
  MissingFieldError,
  TypeMismatchError,
  AmbiguousOrInvalidUnionError,
  DuplicateIdentifierError,
  DanglingReferenceError,
  UnsupportedVersionError,
  InvalidValueError,
  DescriptionLoadError,
  ParseOptionsValidationError,
} from './errors.js';

export { isRuntimeExpression } from './unions.js';

export {
  parseComponentReference,
  collectReferences,
  resolveReferences,
  type ComponentReference,
  type LocatedReference,
} from './references.js';

export {
  emitDescription,
  emitWorkflow,
  emitStep,
  emitPayload,
} from './emit.js';

export {
  parseDocument,
  safeParseDocument,
  serializeDocument,
  serializeDocumentToYaml,
  toTree,
  type ParseResult,
} from './parser.js';

export {
  loadDescription,
  loadDescriptionFromString,
  stringifyDescription,
  detectFormat,
  type DescriptionFormat,
} from './loader.js';
