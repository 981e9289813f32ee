import { describe, it, expect } from 'vitest';
import { fromJson } from '../../tree/json.js';
import {
  buildFailureAction,
  buildSuccessAction,
  buildSuccessActionList,
} from '../builders/action.js';
import { buildComponents } from '../builders/components.js';
import { buildCriterion } from '../builders/criterion.js';
import { buildSourceDescription } from '../builders/description.js';
import {
  buildParameterList,
  buildParameterOrReference,
} from '../builders/parameter.js';
import { buildRequestBody } from '../builders/request-body.js';
import { buildStep } from '../builders/step.js';
import {
  AmbiguousOrInvalidUnionError,
  DuplicateIdentifierError,
  InvalidValueError,
  MissingFieldError,
} from '../errors.js';

describe('entity builders', () => {
  describe('buildStep', () => {
    it('should build a step with defaults for absent lists', () => {
      const step = buildStep(
        fromJson({ stepId: 'findPet', operationId: 'findPets' })
      );

      expect(step).toEqual({
        stepId: 'findPet',
        operation: { kind: 'operationId', operationId: 'findPets' },
        parameters: [],
        successCriteria: [],
        onSuccess: [],
        onFailure: [],
        outputs: {},
        extensions: {},
      });
    });

    it('should read a workflow operation reference', () => {
      const step = buildStep(
        fromJson({ stepId: 'nested', workflowId: '$sourceDescriptions.shared.notify' })
      );

      expect(step.operation).toEqual({
        kind: 'workflowId',
        workflowId: '$sourceDescriptions.shared.notify',
      });
    });

    it('should reject two operation references', () => {
      try {
        buildStep(
          fromJson({
            stepId: 'findPet',
            operationId: 'findPets',
            operationPath: '/pets',
          })
        );
        expect.unreachable();
      } catch (error) {
        expect(error).toBeInstanceOf(AmbiguousOrInvalidUnionError);
        if (error instanceof AmbiguousOrInvalidUnionError) {
          expect(error.candidates).toEqual(['operationId', 'operationPath']);
          expect(error.path).toEqual([]);
        }
      }
    });

    it('should require an operation reference', () => {
      try {
        buildStep(fromJson({ stepId: 'findPet' }));
        expect.unreachable();
      } catch (error) {
        expect(error).toBeInstanceOf(AmbiguousOrInvalidUnionError);
        if (error instanceof AmbiguousOrInvalidUnionError) {
          expect(error.candidates).toEqual([
            'operationId',
            'operationPath',
            'workflowId',
          ]);
        }
      }
    });
  });

  describe('parameters', () => {
    it('should build an inline parameter', () => {
      expect(
        buildParameterOrReference(
          fromJson({ name: 'status', in: 'query', value: 'available', 'x-note': 'n' })
        )
      ).toEqual({
        kind: 'parameter',
        name: 'status',
        in: 'query',
        value: { kind: 'scalar', value: 'available' },
        extensions: { 'x-note': 'n' },
      });
    });

    it('should build a reference with a value override', () => {
      expect(
        buildParameterOrReference(
          fromJson({
            reference: '$components.parameters.pageSize',
            value: '$inputs.limit',
          })
        )
      ).toEqual({
        kind: 'reference',
        reference: '$components.parameters.pageSize',
        targetKind: 'parameters',
        value: { kind: 'expression', expression: '$inputs.limit' },
      });
    });

    it('should reject a reference that also defines inline fields', () => {
      expect(() =>
        buildParameterOrReference(
          fromJson({ reference: '$components.parameters.pageSize', name: 'limit' })
        )
      ).toThrow(
        'A reference cannot also define name. Candidates: reusable object, parameter (at <root>)'
      );
    });

    it('should require a value on inline parameters', () => {
      expect(() =>
        buildParameterOrReference(fromJson({ name: 'status', in: 'query' }))
      ).toThrow(MissingFieldError);
    });

    it('should reject duplicate name and location pairs', () => {
      const map = fromJson({
        parameters: [
          { name: 'status', in: 'query', value: 'a' },
          { name: 'status', in: 'header', value: 'b' },
          { name: 'status', in: 'query', value: 'c' },
        ],
      });

      try {
        buildParameterList(map);
        expect.unreachable();
      } catch (error) {
        expect(error).toBeInstanceOf(DuplicateIdentifierError);
        if (error instanceof DuplicateIdentifierError) {
          expect(error.identifier).toBe('status in query');
          expect(error.path).toEqual(['parameters', 2]);
        }
      }
    });
  });

  describe('buildCriterion', () => {
    it('should leave the type absent for simple conditions', () => {
      expect(buildCriterion(fromJson({ condition: '$statusCode == 200' }))).toEqual(
        { condition: '$statusCode == 200', extensions: {} }
      );
    });

    it('should read an expression type object', () => {
      expect(
        buildCriterion(
          fromJson({
            context: '$response.body',
            condition: '//pet',
            type: { type: 'xpath', version: 'xpath-30' },
          })
        ).type
      ).toEqual({ type: 'xpath', version: 'xpath-30', extensions: {} });
    });

    it('should require a context for jsonpath conditions', () => {
      try {
        buildCriterion(fromJson({ condition: '$.pets', type: 'jsonpath' }));
        expect.unreachable();
      } catch (error) {
        expect(error).toBeInstanceOf(MissingFieldError);
        if (error instanceof MissingFieldError) {
          expect(error.path).toEqual(['context']);
        }
      }
    });

    it('should require a context for xpath expression type objects', () => {
      try {
        buildCriterion(
          fromJson({
            condition: '//pet',
            type: { type: 'xpath', version: 'xpath-30' },
          })
        );
        expect.unreachable();
      } catch (error) {
        expect(error).toBeInstanceOf(MissingFieldError);
        if (error instanceof MissingFieldError) {
          expect(error.path).toEqual(['context']);
        }
      }
    });

    it('should reject an empty condition', () => {
      expect(() => buildCriterion(fromJson({ condition: '' }))).toThrow(
        'Invalid value for "condition": must not be empty (at condition)'
      );
    });

    it('should reject unknown type names', () => {
      expect(() =>
        buildCriterion(fromJson({ condition: 'x', type: 'fuzzy' }))
      ).toThrow(
        'Invalid value for "type": must be one of simple, regex, jsonpath, xpath (at type)'
      );
    });
  });

  describe('actions', () => {
    it('should build a goto success action', () => {
      expect(
        buildSuccessAction(fromJson({ name: 'next', type: 'goto', stepId: 'adopt' }))
      ).toEqual({
        kind: 'successAction',
        name: 'next',
        type: 'goto',
        target: { kind: 'step', stepId: 'adopt' },
        criteria: [],
        extensions: {},
      });
    });

    it('should require exactly one goto target', () => {
      expect(() =>
        buildSuccessAction(
          fromJson({ name: 'next', type: 'goto', stepId: 'a', workflowId: 'b' })
        )
      ).toThrow(AmbiguousOrInvalidUnionError);
      expect(() =>
        buildSuccessAction(fromJson({ name: 'next', type: 'goto' }))
      ).toThrow(AmbiguousOrInvalidUnionError);
    });

    it('should reject a target on an end action', () => {
      expect(() =>
        buildSuccessAction(fromJson({ name: 'done', type: 'end', stepId: 'a' }))
      ).toThrow(
        'Invalid value for "stepId": only allowed when type is goto (at stepId)'
      );
    });

    it('should reject retry fields on success actions', () => {
      expect(() =>
        buildSuccessAction(fromJson({ name: 'done', type: 'end', retryAfter: 1 }))
      ).toThrow(InvalidValueError);
    });

    it('should reject the retry type on success actions', () => {
      expect(() =>
        buildSuccessAction(fromJson({ name: 'again', type: 'retry' }))
      ).toThrow('Invalid value for "type": must be one of end, goto (at type)');
    });

    it('should build a retry failure action', () => {
      expect(
        buildFailureAction(
          fromJson({
            name: 'again',
            type: 'retry',
            retryAfter: 0.5,
            retryLimit: 2,
            stepId: 'findPet',
          })
        )
      ).toEqual({
        kind: 'failureAction',
        name: 'again',
        type: 'retry',
        retryAfter: 0.5,
        retryLimit: 2,
        target: { kind: 'step', stepId: 'findPet' },
        criteria: [],
        extensions: {},
      });
    });

    it('should require both retry fields', () => {
      try {
        buildFailureAction(fromJson({ name: 'again', type: 'retry', retryLimit: 2 }));
        expect.unreachable();
      } catch (error) {
        expect(error).toBeInstanceOf(MissingFieldError);
        if (error instanceof MissingFieldError) {
          expect(error.path).toEqual(['retryAfter']);
        }
      }
    });

    it('should reject a fractional retry limit', () => {
      expect(() =>
        buildFailureAction(
          fromJson({ name: 'again', type: 'retry', retryAfter: 1, retryLimit: 1.5 })
        )
      ).toThrow(
        'Invalid value for "retryLimit": must be a non-negative integer (at retryLimit)'
      );
    });

    it('should reject a negative retry delay', () => {
      expect(() =>
        buildFailureAction(
          fromJson({ name: 'again', type: 'retry', retryAfter: -1, retryLimit: 1 })
        )
      ).toThrow('Invalid value for "retryAfter": must not be negative (at retryAfter)');
    });

    it('should not allow value overrides on action references', () => {
      expect(() =>
        buildSuccessActionList(
          fromJson({
            onSuccess: [
              { reference: '$components.successActions.done', value: 1 },
            ],
          }),
          'onSuccess'
        )
      ).toThrow(
        'Invalid value for "value": only parameter references can override a value (at onSuccess[0].value)'
      );
    });
  });

  describe('buildRequestBody', () => {
    it('should build payload and replacements', () => {
      expect(
        buildRequestBody(
          fromJson({
            contentType: 'application/json',
            payload: { petId: 0 },
            replacements: [{ target: '/petId', value: '$steps.findPet.outputs.petId' }],
          })
        )
      ).toEqual({
        contentType: 'application/json',
        payload: { kind: 'structured', value: { petId: 0 } },
        replacements: [
          {
            target: '/petId',
            value: { kind: 'expression', expression: '$steps.findPet.outputs.petId' },
            extensions: {},
          },
        ],
        extensions: {},
      });
    });

    it('should reject an empty replacement target', () => {
      try {
        buildRequestBody(
          fromJson({
            contentType: 'application/json',
            replacements: [{ target: '', value: 1 }],
          })
        );
        expect.unreachable();
      } catch (error) {
        expect(error).toBeInstanceOf(InvalidValueError);
        if (error instanceof InvalidValueError) {
          expect(error.path).toEqual(['replacements', 0, 'target']);
        }
      }
    });

    it('should require a content type', () => {
      expect(() => buildRequestBody(fromJson({ payload: 'x' }))).toThrow(
        'Missing required field "contentType" (at contentType)'
      );
    });
  });

  describe('buildComponents', () => {
    it('should build every component section', () => {
      const components = buildComponents(
        fromJson({
          inputs: { adoption: { type: 'object' } },
          parameters: { storeId: { name: 'storeId', in: 'header', value: 's-1' } },
          successActions: { done: { name: 'done', type: 'end' } },
          'x-owner': 'pets',
        })
      );

      expect(components.inputs).toEqual({ adoption: { type: 'object' } });
      expect(Object.keys(components.parameters)).toEqual(['storeId']);
      expect(components.successActions.done.type).toBe('end');
      expect(components.failureActions).toEqual({});
      expect(components.extensions).toEqual({ 'x-owner': 'pets' });
    });

    it('should reject malformed component names', () => {
      expect(() =>
        buildComponents(
          fromJson({ parameters: { 'store id': { name: 'a', value: 1 } } })
        )
      ).toThrow(InvalidValueError);
    });
  });

  describe('buildSourceDescription', () => {
    it('should reject an empty url', () => {
      expect(() =>
        buildSourceDescription(fromJson({ name: 'petStore', url: '' }))
      ).toThrow('Invalid value for "url": must not be empty (at url)');
    });
  });
});
