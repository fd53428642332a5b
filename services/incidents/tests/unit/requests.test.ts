import assert from 'node:assert/strict';
import { test } from 'node:test';
import { ValidationError } from '../../src/errors/domain';
import {
  parseAirportCodes,
  parseBulkIdentifiers,
  parseEvaluatorId,
  parseSubmissionPayload
} from '../../src/schemas/requests';

test('bulk identifiers are trimmed and de-duplicated in order', () => {
  assert.deepEqual(parseBulkIdentifiers([' asrs_1', 'pci_2', 'asrs_1 ']), ['asrs_1', 'pci_2']);
  assert.deepEqual(parseBulkIdentifiers([]), []);
});

test('bulk body must be an array of non-empty strings', () => {
  assert.throws(() => parseBulkIdentifiers({ ids: ['asrs_1'] }), (error: unknown) => {
    assert(error instanceof ValidationError);
    assert.deepEqual(error.issues, [
      { field: 'identifiers', message: 'Request body must be a JSON array of identifiers' }
    ]);
    return true;
  });
  assert.throws(() => parseBulkIdentifiers(['asrs_1', '  ']), (error: unknown) => {
    assert(error instanceof ValidationError);
    assert.deepEqual(error.issues, [{ field: 'identifiers.1', message: 'Identifier must not be empty' }]);
    return true;
  });
});

test('bulk body is capped', () => {
  const identifiers = Array.from({ length: 5001 }, (_, index) => `asrs_${index}`);
  assert.throws(() => parseBulkIdentifiers(identifiers), ValidationError);
});

test('submission payload maps to camel-cased fields', () => {
  assert.deepEqual(
    parseSubmissionPayload({
      classification_result_id: '17',
      evaluator_id: 'eva',
      human_category: 'SCF-PP',
      human_confidence: 0.75
    }),
    {
      classificationResultId: 17,
      evaluatorId: 'eva',
      humanCategory: 'SCF-PP',
      humanConfidence: 0.75,
      humanReasoning: null
    }
  );
});

test('submission confidence must lie in the unit interval', () => {
  assert.throws(
    () =>
      parseSubmissionPayload({
        classification_result_id: 1,
        evaluator_id: 'eva',
        human_category: 'RE',
        human_confidence: 1.5
      }),
    (error: unknown) => {
      assert(error instanceof ValidationError);
      assert.deepEqual(error.issues, [
        { field: 'human_confidence', message: 'human_confidence must be between 0 and 1' }
      ]);
      return true;
    }
  );
});

test('submission ids must fit an integer column', () => {
  const payload = { evaluator_id: 'eva', human_category: 'RE', human_confidence: 0.5 };
  const largest = parseSubmissionPayload({ ...payload, classification_result_id: 2_147_483_647 });
  assert.equal(largest.classificationResultId, 2_147_483_647);
  assert.throws(
    () => parseSubmissionPayload({ ...payload, classification_result_id: '2147483648' }),
    (error: unknown) => {
      assert(error instanceof ValidationError);
      assert.deepEqual(error.issues, [
        { field: 'classification_result_id', message: 'classification_result_id is out of range' }
      ]);
      return true;
    }
  );
});

test('evaluator ids are trimmed and required', () => {
  assert.equal(parseEvaluatorId(' eva '), 'eva');
  assert.throws(() => parseEvaluatorId(''), ValidationError);
});

test('airport codes accept a single value or a list', () => {
  assert.deepEqual(parseAirportCodes({}), []);
  assert.deepEqual(parseAirportCodes({ codes: 'KJFK' }), ['KJFK']);
  assert.deepEqual(parseAirportCodes({ codes: ['KJFK', 'LAX'] }), ['KJFK', 'LAX']);
});
