import type { QueryResult, QueryResultRow } from 'pg';
import type { QueryClient } from '../../src/db/types';

export type RecordedQuery = {
  text: string;
  values: unknown[];
};

type Responder = (query: RecordedQuery) => QueryResultRow[];

/**
 * In-process stand-in for a pooled pg client. Each query is recorded and
 * answered by the next queued row set, or by the responder when one is given.
 */
export class RecordingClient implements QueryClient {
  readonly queries: RecordedQuery[] = [];
  private readonly queued: QueryResultRow[][];

  constructor(
    rowSets: QueryResultRow[][] = [],
    private readonly responder?: Responder
  ) {
    this.queued = [...rowSets];
  }

  async query<R extends QueryResultRow = QueryResultRow>(text: string, values: unknown[] = []): Promise<QueryResult<R>> {
    const recorded = { text, values };
    this.queries.push(recorded);
    const rows = this.responder ? this.responder(recorded) : (this.queued.shift() ?? []);
    return {
      command: 'SELECT',
      rowCount: rows.length,
      oid: 0,
      fields: [],
      rows: rows as R[]
    };
  }
}
