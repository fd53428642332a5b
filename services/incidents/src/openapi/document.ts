import type { OpenAPIV3 } from 'openapi-types';
import { CATEGORY_DIMENSIONS } from '../filters/aggregationParams';
import { SOURCE_KINDS } from '../sources/registry';

const nullableString: OpenAPIV3.SchemaObject = { type: 'string', nullable: true };

const sourceRecordProperties: Record<string, OpenAPIV3.SchemaObject> = {
  date: { type: 'string', format: 'date', nullable: true },
  phase: nullableString,
  aircraft_type: nullableString,
  location: nullableString,
  operator: nullableString,
  narrative: nullableString
};

const sourceRecordSchema: OpenAPIV3.SchemaObject = {
  type: 'object',
  required: ['source_kind', 'uid'],
  properties: {
    source_kind: { type: 'string', enum: [...SOURCE_KINDS] },
    uid: { type: 'string' },
    ...sourceRecordProperties
  }
};

const classificationResultProperties: Record<string, OpenAPIV3.SchemaObject> = {
  id: { type: 'integer' },
  source_uid: { type: 'string' },
  model_version: nullableString,
  predicted_category: nullableString,
  predicted_confidence: { type: 'number', nullable: true },
  final_category: nullableString,
  is_complete: { type: 'boolean' },
  evaluator_id: nullableString,
  processed_at: { type: 'string', format: 'date-time', nullable: true }
};

const classificationResultSchema: OpenAPIV3.SchemaObject = {
  type: 'object',
  required: ['id', 'source_uid', 'is_complete'],
  properties: classificationResultProperties
};

const mergedRecordSchema: OpenAPIV3.SchemaObject = {
  type: 'object',
  required: ['id', 'source_uid', 'is_complete', 'origin_source_kind', 'origin_uid'],
  properties: {
    ...classificationResultProperties,
    origin_source_kind: { type: 'string' },
    origin_uid: { type: 'string' },
    ...Object.fromEntries(Object.entries(sourceRecordProperties).map(([key, schema]) => [`origin_${key}`, schema] as const))
  }
};

const countMapSchema: OpenAPIV3.SchemaObject = {
  type: 'object',
  additionalProperties: { type: 'integer', minimum: 0 }
};

const airportSchema: OpenAPIV3.SchemaObject = {
  type: 'object',
  properties: {
    icao_code: nullableString,
    iata_code: nullableString,
    name: nullableString,
    city: nullableString,
    country: nullableString,
    lat: { type: 'number', nullable: true },
    lon: { type: 'number', nullable: true }
  }
};

const errorSchema: OpenAPIV3.SchemaObject = {
  type: 'object',
  required: ['statusCode', 'error', 'message'],
  properties: {
    statusCode: { type: 'integer' },
    error: { type: 'string' },
    message: { type: 'string' },
    details: {},
    retryable: { type: 'boolean' }
  }
};

function jsonResponse(description: string, schema: OpenAPIV3.SchemaObject | OpenAPIV3.ReferenceObject): OpenAPIV3.ResponseObject {
  return {
    description,
    content: { 'application/json': { schema } }
  };
}

const errorResponses: OpenAPIV3.ResponsesObject = {
  '400': jsonResponse('Invalid parameters', { $ref: '#/components/schemas/Error' }),
  '401': jsonResponse('Missing or invalid bearer token', { $ref: '#/components/schemas/Error' }),
  '403': jsonResponse('Token lacks the required scope', { $ref: '#/components/schemas/Error' }),
  '503': jsonResponse('Database unavailable', { $ref: '#/components/schemas/Error' })
};

function queryParameter(name: string, schema: OpenAPIV3.SchemaObject, description?: string): OpenAPIV3.ParameterObject {
  return { name, in: 'query', required: false, schema, description };
}

const filterParameters: OpenAPIV3.ParameterObject[] = [
  queryParameter('operators', { type: 'array', items: { type: 'string' } }, 'Keep incidents whose operator matches any value'),
  queryParameter('phases', { type: 'array', items: { type: 'string' } }, 'Keep incidents whose flight phase matches any value'),
  queryParameter('aircraft_types', { type: 'array', items: { type: 'string' } }),
  queryParameter('locations', { type: 'array', items: { type: 'string' } }),
  queryParameter('start_period', { type: 'string', pattern: '^\\d{4}-(0[1-9]|1[0-2])$' }, 'Inclusive lower bound, YYYY-MM'),
  queryParameter('end_period', { type: 'string', pattern: '^\\d{4}-(0[1-9]|1[0-2])$' }, 'Inclusive upper bound, YYYY-MM'),
  queryParameter('period_granularity', { type: 'string', enum: ['year', 'month'], default: 'month' })
];

const dimensionSchema: OpenAPIV3.SchemaObject = { type: 'string', enum: [...CATEGORY_DIMENSIONS] };

function aggregateOperation(
  operationId: string,
  summary: string,
  itemSchema: OpenAPIV3.SchemaObject,
  extraParameters: OpenAPIV3.ParameterObject[] = []
): OpenAPIV3.PathItemObject {
  return {
    get: {
      tags: ['Aggregates'],
      summary,
      operationId,
      parameters: [...extraParameters, ...filterParameters],
      responses: {
        '200': jsonResponse(summary, itemSchema),
        ...errorResponses
      }
    }
  };
}

export const openApiDocument: OpenAPIV3.Document = {
  openapi: '3.1.0',
  info: {
    title: 'Aerolens Incidents API',
    description: 'Aviation incident retrieval, aggregation and human evaluation',
    version: '0.1.0'
  },
  servers: [
    {
      url: 'http://127.0.0.1:4300',
      description: 'Local development'
    }
  ],
  tags: [
    { name: 'Records', description: 'Source records and classification results' },
    { name: 'Aggregates', description: 'Filtered analytical pipelines over all sources' },
    { name: 'Airports', description: 'Airport directory lookups' },
    { name: 'Evaluations', description: 'Human evaluation workflow' },
    { name: 'System', description: 'Health and metrics' }
  ],
  security: [{ bearerAuth: [] }],
  paths: {
    '/records/{uid}': {
      get: {
        tags: ['Records'],
        summary: 'Fetch a source record by identifier',
        operationId: 'getRecord',
        parameters: [{ name: 'uid', in: 'path', required: true, schema: { type: 'string' } }],
        responses: {
          '200': jsonResponse('Source record', { $ref: '#/components/schemas/SourceRecord' }),
          '404': jsonResponse('Record not found', { $ref: '#/components/schemas/Error' }),
          ...errorResponses
        }
      }
    },
    '/classification-results': {
      get: {
        tags: ['Records'],
        summary: 'List classification results',
        operationId: 'listClassificationResults',
        parameters: [
          queryParameter('skip', { type: 'integer', minimum: 0, default: 0 }),
          queryParameter('limit', { type: 'integer', minimum: 1, maximum: 1000, default: 100 }),
          queryParameter('evaluator_id', { type: 'string' })
        ],
        responses: {
          '200': jsonResponse('Classification results ordered by id', {
            type: 'array',
            items: { $ref: '#/components/schemas/ClassificationResult' }
          }),
          ...errorResponses
        }
      }
    },
    '/classification-results/{uid}/full': {
      get: {
        tags: ['Records'],
        summary: 'Fetch the latest classification result merged with its source record',
        operationId: 'getFullClassificationResult',
        parameters: [{ name: 'uid', in: 'path', required: true, schema: { type: 'string' } }],
        responses: {
          '200': jsonResponse('Merged record', { $ref: '#/components/schemas/MergedRecord' }),
          '404': jsonResponse('No classification result', { $ref: '#/components/schemas/Error' }),
          ...errorResponses
        }
      }
    },
    '/classification-results/bulk': {
      post: {
        tags: ['Records'],
        summary: 'Retrieve merged records for many identifiers',
        operationId: 'bulkRetrieve',
        requestBody: {
          required: true,
          content: {
            'application/json': {
              schema: { type: 'array', items: { type: 'string', minLength: 1, maxLength: 256 }, maxItems: 5000 }
            }
          }
        },
        responses: {
          '200': jsonResponse('Merged records with summary statistics', {
            type: 'object',
            required: ['results', 'aggregates', 'unresolved', 'not_found'],
            properties: {
              results: { type: 'object', additionalProperties: { $ref: '#/components/schemas/MergedRecord' } },
              aggregates: {
                type: 'object',
                properties: {
                  total_incidents: { type: 'integer' },
                  unique_operators: { type: 'integer' },
                  unique_aircraft_types: { type: 'integer' },
                  phase_counts: countMapSchema,
                  operator_counts: countMapSchema
                }
              },
              unresolved: { type: 'array', items: { type: 'string' } },
              not_found: { type: 'array', items: { type: 'string' } }
            }
          }),
          ...errorResponses
        }
      }
    },
    '/aggregates/over-time': aggregateOperation('getOverTime', 'Incident counts per period', {
      type: 'array',
      items: {
        type: 'object',
        properties: { period: { type: 'string' }, incident_count: { type: 'integer' } }
      }
    }),
    '/aggregates/top-n': aggregateOperation(
      'getTopN',
      'Most frequent values of a dimension',
      {
        type: 'array',
        items: {
          type: 'object',
          properties: { category: { type: 'string' }, incident_count: { type: 'integer' } }
        }
      },
      [
        { name: 'category', in: 'query', required: true, schema: dimensionSchema },
        queryParameter('n', { type: 'integer', minimum: 1, maximum: 100, default: 10 })
      ]
    ),
    '/aggregates/heatmap': aggregateOperation(
      'getHeatmap',
      'Incident counts for pairs of dimension values',
      {
        type: 'array',
        items: {
          type: 'object',
          properties: { x: { type: 'string' }, y: { type: 'string' }, incident_count: { type: 'integer' } }
        }
      },
      [
        { name: 'dimension1', in: 'query', required: true, schema: dimensionSchema },
        { name: 'dimension2', in: 'query', required: true, schema: dimensionSchema }
      ]
    ),
    '/aggregates/hierarchy': aggregateOperation('getHierarchy', 'Counts by operator, aircraft type and phase', {
      type: 'array',
      items: {
        type: 'object',
        properties: {
          operator: { type: 'string' },
          aircraft_type: { type: 'string' },
          phase: { type: 'string' },
          incident_count: { type: 'integer' }
        }
      }
    }),
    '/aggregates/statistics': aggregateOperation('getStatistics', 'Total incident count', {
      type: 'object',
      properties: { total_incidents: { type: 'integer' } }
    }),
    '/aggregates/geolocations': aggregateOperation(
      'getGeolocations',
      'Incidents with airport coordinates',
      {
        type: 'array',
        items: {
          type: 'object',
          properties: {
            uid: { type: 'string' },
            date: { type: 'string', format: 'date' },
            location: { type: 'string' },
            airport_name: nullableString,
            lat: { type: 'number' },
            lon: { type: 'number' }
          }
        }
      },
      [queryParameter('limit', { type: 'integer', minimum: 1, maximum: 50000, default: 10000 })]
    ),
    '/aggregates/seasonal-distribution': {
      get: {
        tags: ['Aggregates'],
        summary: 'Incident counts per month and year',
        operationId: 'getSeasonalDistribution',
        parameters: [
          queryParameter('start_year', { type: 'integer', minimum: 1900, maximum: 2999 }),
          queryParameter('end_year', { type: 'integer', minimum: 1900, maximum: 2999 })
        ],
        responses: {
          '200': jsonResponse('Zero-filled month by year grid', {
            type: 'array',
            items: {
              type: 'object',
              properties: { x: { type: 'string' }, y: { type: 'string' }, v: { type: 'integer' } }
            }
          }),
          ...errorResponses
        }
      }
    },
    '/reports/incident-ids': aggregateOperation(
      'listIncidentIds',
      'Identifiers of matching incidents, newest first',
      { type: 'array', items: { type: 'string' } },
      [queryParameter('limit', { type: 'integer', minimum: 1, maximum: 10000, default: 1000 })]
    ),
    '/airports': {
      get: {
        tags: ['Airports'],
        summary: 'Look up airports by ICAO or IATA code',
        operationId: 'lookupAirports',
        parameters: [queryParameter('codes', { type: 'array', items: { type: 'string' }, maxItems: 500 })],
        responses: {
          '200': jsonResponse('Airports keyed by lowercased requested code', {
            type: 'object',
            additionalProperties: { $ref: '#/components/schemas/Airport' }
          }),
          ...errorResponses
        }
      }
    },
    '/airports/{code}': {
      get: {
        tags: ['Airports'],
        summary: 'Fetch one airport',
        operationId: 'getAirport',
        parameters: [{ name: 'code', in: 'path', required: true, schema: { type: 'string' } }],
        responses: {
          '200': jsonResponse('Airport', { $ref: '#/components/schemas/Airport' }),
          '404': jsonResponse('Airport not found', { $ref: '#/components/schemas/Error' }),
          ...errorResponses
        }
      }
    },
    '/evaluations/categories': {
      get: {
        tags: ['Evaluations'],
        summary: 'List occurrence categories offered to evaluators',
        operationId: 'listEvaluationCategories',
        responses: {
          '200': jsonResponse('Occurrence categories', {
            type: 'object',
            properties: {
              categories: {
                type: 'array',
                items: {
                  type: 'object',
                  required: ['code', 'name', 'description'],
                  properties: {
                    code: { type: 'string' },
                    name: { type: 'string' },
                    description: { type: 'string' }
                  }
                }
              }
            }
          })
        }
      }
    },
    '/evaluations/assignments/next/{evaluatorId}': {
      get: {
        tags: ['Evaluations'],
        summary: 'Oldest pending assignment for an evaluator',
        operationId: 'getNextAssignment',
        parameters: [{ name: 'evaluatorId', in: 'path', required: true, schema: { type: 'string' } }],
        responses: {
          '200': jsonResponse('Pending assignment', {
            type: 'object',
            properties: {
              assignment_id: { type: 'integer' },
              classification_result_id: { type: 'integer' },
              source_uid: { type: 'string' }
            }
          }),
          '404': jsonResponse('No pending assignment', { $ref: '#/components/schemas/Error' }),
          ...errorResponses
        }
      }
    },
    '/evaluations/submit': {
      post: {
        tags: ['Evaluations'],
        summary: 'Submit a human evaluation and complete its assignment',
        operationId: 'submitEvaluation',
        requestBody: {
          required: true,
          content: {
            'application/json': {
              schema: {
                type: 'object',
                required: ['classification_result_id', 'evaluator_id', 'human_category', 'human_confidence'],
                properties: {
                  classification_result_id: { type: 'integer', minimum: 1 },
                  evaluator_id: { type: 'string', maxLength: 64 },
                  human_category: { type: 'string', maxLength: 64 },
                  human_confidence: { type: 'number', minimum: 0, maximum: 1 },
                  human_reasoning: nullableString
                }
              }
            }
          }
        },
        responses: {
          '200': jsonResponse('Evaluation recorded', {
            type: 'object',
            properties: {
              status: { type: 'string', enum: ['success'] },
              message: { type: 'string' },
              assignment_id: { type: 'integer' },
              evaluation_id: { type: 'integer' }
            }
          }),
          '409': jsonResponse('No pending assignment matched', { $ref: '#/components/schemas/Error' }),
          ...errorResponses
        }
      }
    },
    '/healthz': {
      get: {
        tags: ['System'],
        summary: 'Liveness probe',
        security: [],
        responses: { '200': { description: 'Service is running' } }
      }
    },
    '/readyz': {
      get: {
        tags: ['System'],
        summary: 'Readiness probe',
        security: [],
        responses: {
          '200': { description: 'Database reachable' },
          '503': { description: 'Database unavailable' }
        }
      }
    },
    '/metrics': {
      get: {
        tags: ['System'],
        summary: 'Prometheus metrics',
        security: [],
        responses: {
          '200': { description: 'Metrics in Prometheus text format' },
          '503': { description: 'Metrics disabled' }
        }
      }
    }
  },
  components: {
    securitySchemes: {
      bearerAuth: { type: 'http', scheme: 'bearer' }
    },
    schemas: {
      SourceRecord: sourceRecordSchema,
      ClassificationResult: classificationResultSchema,
      MergedRecord: mergedRecordSchema,
      Airport: airportSchema,
      Error: errorSchema
    }
  }
};
