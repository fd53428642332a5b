import type { FastifyBaseLogger } from 'fastify';
import { lookupAirports as lookupAirportsRepo } from '../airports/airportDirectory';
import type { AuthIdentity } from '../auth/identity';
import { withConnection } from '../db/client';
import {
  fetchNextAssignment as fetchNextAssignmentRepo,
  fetchSourceRecord as fetchSourceRecordRepo,
  listClassificationResults as listClassificationResultsRepo
} from '../db/recordsRepository';
import type {
  AirportDetails,
  ClassificationResult,
  MergedRecord,
  NextAssignment,
  QueryClient,
  SourceRecord
} from '../db/types';
import { RecordNotFoundError, ValidationError, type ValidationIssue } from '../errors/domain';
import { listOccurrenceCategories, type OccurrenceCategory } from '../evaluation/categories';
import {
  submitEvaluation as submitEvaluationRepo,
  type HumanEvaluationSubmission,
  type SubmissionOutcome
} from '../evaluation/assignmentGuard';
import {
  parseClassificationListParams,
  parseHeatmapParams,
  parseListingLimit,
  parseSeasonalParams,
  parseTopNParams
} from '../filters/aggregationParams';
import {
  parseFilterSpecification,
  type FilterSpecification,
  type RawParameters
} from '../filters/filterSpecification';
import {
  runGeolocation,
  runHeatmap,
  runHierarchy,
  runIncidentIds,
  runOverTime,
  runSeasonalDistribution,
  runStatistics,
  runTopN,
  type GeolocatedIncident,
  type HeatmapCell,
  type HierarchyRow,
  type IncidentIdRow,
  type OverTimeRow,
  type PipelineObserver,
  type PipelineOptions,
  type SeasonalCell,
  type StatisticsResult,
  type TopNRow
} from '../query/pipelines';
import { retrieveBulk as retrieveBulkRepo, type BulkRetrievalResult } from '../retrieval/bulkRetriever';
import { emptySummaryStatistics } from '../retrieval/summaryStatistics';
import { resolve } from '../sources/registry';

export type OperationContext = {
  logger: FastifyBaseLogger;
  /** Caller resolved by the auth plugin; absent outside HTTP requests. */
  actor?: Pick<AuthIdentity, 'subject' | 'kind'>;
};

export type ConnectionRunner = <T>(fn: (client: QueryClient) => Promise<T>) => Promise<T>;

export const GEOLOCATION_LIMITS = { defaultLimit: 10_000, maxLimit: 50_000 };
export const INCIDENT_ID_LIMITS = { defaultLimit: 1_000, maxLimit: 10_000 };

export type IncidentServiceDependencies = {
  db?: {
    withConnection?: ConnectionRunner;
    fetchSourceRecord?: typeof fetchSourceRecordRepo;
    listClassificationResults?: typeof listClassificationResultsRepo;
    fetchNextAssignment?: typeof fetchNextAssignmentRepo;
    retrieveBulk?: typeof retrieveBulkRepo;
    submitEvaluation?: typeof submitEvaluationRepo;
    lookupAirports?: typeof lookupAirportsRepo;
  };
  clock?: {
    now: () => Date;
  };
  observePipeline?: PipelineObserver;
};

function captureIssues<T>(parse: () => T, issues: ValidationIssue[]): T | undefined {
  try {
    return parse();
  } catch (err) {
    if (!(err instanceof ValidationError)) {
      throw err;
    }
    issues.push(...err.issues);
    return undefined;
  }
}

/** Parses pipeline parameters and the filter together so every issue is reported at once. */
function parsePipelineRequest<P>(
  raw: RawParameters,
  parseParams: (raw: RawParameters) => P
): { filter: FilterSpecification; params: P } {
  const issues: ValidationIssue[] = [];
  const params = captureIssues(() => parseParams(raw), issues);
  const filter = captureIssues(() => parseFilterSpecification(raw), issues);
  if (params === undefined || filter === undefined) {
    throw new ValidationError(issues);
  }
  return { filter, params };
}

export type IncidentService = ReturnType<typeof createIncidentService>;

export function createIncidentService(deps: IncidentServiceDependencies = {}) {
  const runWithConnection: ConnectionRunner = deps.db?.withConnection ?? withConnection;
  const {
    fetchSourceRecord: fetchSourceRecordDb = fetchSourceRecordRepo,
    listClassificationResults: listClassificationResultsDb = listClassificationResultsRepo,
    fetchNextAssignment: fetchNextAssignmentDb = fetchNextAssignmentRepo,
    retrieveBulk: retrieveBulkDb = retrieveBulkRepo,
    submitEvaluation: submitEvaluationDb = submitEvaluationRepo,
    lookupAirports: lookupAirportsDb = lookupAirportsRepo
  } = deps.db ?? {};

  const now = deps.clock?.now ?? (() => new Date());

  function pipelineOptions(context: OperationContext): PipelineOptions {
    return { logger: context.logger, observe: deps.observePipeline };
  }

  async function resolveAndFetchRecord(identifier: string): Promise<SourceRecord> {
    const source = resolve(identifier);
    const record = await runWithConnection((client) => fetchSourceRecordDb(client, source, identifier));
    if (!record) {
      throw new RecordNotFoundError(`Record ${identifier} not found`);
    }
    return record;
  }

  async function listClassificationResults(raw: RawParameters): Promise<ClassificationResult[]> {
    const params = parseClassificationListParams(raw);
    return runWithConnection((client) => listClassificationResultsDb(client, params));
  }

  async function bulkRetrieve(identifiers: readonly string[], context: OperationContext): Promise<BulkRetrievalResult> {
    if (identifiers.length === 0) {
      return { results: new Map(), unresolved: [], notFound: [], aggregates: emptySummaryStatistics() };
    }
    const result = await runWithConnection((client) => retrieveBulkDb(client, identifiers));
    if (result.unresolved.length > 0) {
      context.logger.debug({ unresolved: result.unresolved.length }, 'bulk retrieval skipped unknown identifiers');
    }
    return result;
  }

  async function fetchFullClassificationResult(identifier: string): Promise<MergedRecord> {
    resolve(identifier);
    const result = await runWithConnection((client) => retrieveBulkDb(client, [identifier]));
    const record = result.results.get(identifier);
    if (!record) {
      throw new RecordNotFoundError(`No classification result found for ${identifier}`);
    }
    return record;
  }

  async function getOverTime(raw: RawParameters, context: OperationContext): Promise<OverTimeRow[]> {
    const filter = parseFilterSpecification(raw);
    return runWithConnection((client) => runOverTime(client, filter, pipelineOptions(context)));
  }

  async function getTopN(raw: RawParameters, context: OperationContext): Promise<TopNRow[]> {
    const { filter, params } = parsePipelineRequest(raw, parseTopNParams);
    return runWithConnection((client) => runTopN(client, filter, params, pipelineOptions(context)));
  }

  async function getHeatmap(raw: RawParameters, context: OperationContext): Promise<HeatmapCell[]> {
    const { filter, params } = parsePipelineRequest(raw, parseHeatmapParams);
    return runWithConnection((client) => runHeatmap(client, filter, params, pipelineOptions(context)));
  }

  async function getHierarchy(raw: RawParameters, context: OperationContext): Promise<HierarchyRow[]> {
    const filter = parseFilterSpecification(raw);
    return runWithConnection((client) => runHierarchy(client, filter, pipelineOptions(context)));
  }

  async function getStatistics(raw: RawParameters, context: OperationContext): Promise<StatisticsResult> {
    const filter = parseFilterSpecification(raw);
    return runWithConnection((client) => runStatistics(client, filter, pipelineOptions(context)));
  }

  async function getGeolocations(raw: RawParameters, context: OperationContext): Promise<GeolocatedIncident[]> {
    const { filter, params: limit } = parsePipelineRequest(raw, (value) => parseListingLimit(value, GEOLOCATION_LIMITS));
    return runWithConnection((client) =>
      runGeolocation(client, filter, { limit }, { ...pipelineOptions(context), lookupAirports: lookupAirportsDb })
    );
  }

  async function getSeasonalDistribution(raw: RawParameters, context: OperationContext): Promise<SeasonalCell[]> {
    const params = parseSeasonalParams(raw);
    return runWithConnection((client) => runSeasonalDistribution(client, params, pipelineOptions(context)));
  }

  async function listIncidentIds(raw: RawParameters, context: OperationContext): Promise<IncidentIdRow[]> {
    const { filter, params: limit } = parsePipelineRequest(raw, (value) => parseListingLimit(value, INCIDENT_ID_LIMITS));
    return runWithConnection((client) => runIncidentIds(client, filter, { limit }, pipelineOptions(context)));
  }

  async function lookupAirports(codes: readonly string[]): Promise<Map<string, AirportDetails>> {
    if (codes.length === 0) {
      return new Map();
    }
    return runWithConnection((client) => lookupAirportsDb(client, codes));
  }

  async function getAirport(code: string): Promise<AirportDetails> {
    const key = code.trim().toLowerCase();
    const airports = await lookupAirports([key]);
    const airport = airports.get(key);
    if (!airport) {
      throw new RecordNotFoundError(`Airport ${code} not found`);
    }
    return airport;
  }

  function listEvaluationCategories(): readonly OccurrenceCategory[] {
    return listOccurrenceCategories();
  }

  async function nextAssignment(evaluatorId: string): Promise<NextAssignment> {
    const assignment = await runWithConnection((client) => fetchNextAssignmentDb(client, evaluatorId));
    if (!assignment) {
      throw new RecordNotFoundError(`No pending assignment for evaluator ${evaluatorId}`);
    }
    return assignment;
  }

  async function submitHumanEvaluation(
    submission: HumanEvaluationSubmission,
    context: OperationContext
  ): Promise<SubmissionOutcome> {
    const outcome = await runWithConnection((client) => submitEvaluationDb(client, submission, now()));
    context.logger.info(
      {
        classificationResultId: submission.classificationResultId,
        evaluatorId: submission.evaluatorId,
        status: outcome.status,
        actor: context.actor?.subject ?? null,
        actorKind: context.actor?.kind ?? null
      },
      'human evaluation submitted'
    );
    return outcome;
  }

  return {
    resolveAndFetchRecord,
    listClassificationResults,
    bulkRetrieve,
    fetchFullClassificationResult,
    getOverTime,
    getTopN,
    getHeatmap,
    getHierarchy,
    getStatistics,
    getGeolocations,
    getSeasonalDistribution,
    listIncidentIds,
    lookupAirports,
    getAirport,
    listEvaluationCategories,
    nextAssignment,
    submitHumanEvaluation
  };
}
