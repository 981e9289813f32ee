/**
 * Zod schemas for the enumerations, patterns and options of Arazzo descriptions
 */

import { z } from 'zod';

// Every 1.0.x patch release shares the same object model
export const SUPPORTED_ARAZZO_VERSIONS = ['1.0.x'] as const;
export const ArazzoVersionSchema = z.string().regex(/^1\.0\.\d+$/);

export const EXTENSION_PREFIX = 'x-';

export const SourceDescriptionTypeSchema = z.enum(['openapi', 'arazzo']);

export const ParameterLocationSchema = z.enum([
  'path',
  'query',
  'header',
  'cookie',
]);

export const CriterionTypeSchema = z.enum([
  'simple',
  'regex',
  'jsonpath',
  'xpath',
]);

/**
 * Criterion types that can also be given as an expression type object
 * together with a version
 */
export const CriterionExpressionTypeNameSchema = z.enum(['jsonpath', 'xpath']);

export const SuccessActionTypeSchema = z.enum(['end', 'goto']);

export const FailureActionTypeSchema = z.enum(['end', 'goto', 'retry']);

/**
 * Component names and output names
 */
export const ComponentKeySchema = z.string().regex(/^[a-zA-Z0-9.\-_]+$/);

export const ComponentKindSchema = z.enum([
  'inputs',
  'parameters',
  'successActions',
  'failureActions',
]);

/**
 * Textual shape of a runtime expression. Expressions are never evaluated.
 */
export const RuntimeExpressionSchema = z
  .string()
  .regex(
    /^\$(url|method|statusCode|request\.|response\.|message\.|inputs\.|outputs\.|steps\.|workflows\.|sourceDescriptions\.|components\.)/
  );

/**
 * `$components.<kind>.<name>`
 */
export const ComponentReferenceSchema = z
  .string()
  .regex(
    /^\$components\.(parameters|successActions|failureActions)\.[a-zA-Z0-9.\-_]+$/
  );

export const RetryAfterSchema = z.number().nonnegative();
export const RetryLimitSchema = z.number().int().nonnegative();

/**
 * Options accepted by parseDocument and the loaders
 */
export const ParseOptionsSchema = z.object({
  /** Check reusable object references against the components section */
  resolveReferences: z.boolean().default(true),
});
