import { z } from 'zod';
import { DatabaseConnection, SqlParam } from '../../types/database.js';
import { RelationName, RelationTableMap } from '../../config/types.js';
import {
  DATABASE_RETRY_POLICY,
  InvalidStateError,
  RetryPolicy,
  RetryStrategy,
  SchemaValidationError,
  SourceUnavailableError,
} from '../../errors/index.js';
import { logger } from '../../utils/logging.js';
import { withDeadline } from '../../utils/deadline.js';
import { getErrorMessage, toError } from '../../utils/errorHandling.js';
import { RelationRow, columnsOf, relationSchemas } from './relationSchemas.js';

export interface RelationReaderOptions {
  tables: RelationTableMap;
  /** Rows fetched per query */
  pageSize: number;
  /** Deadline per query in ms; 0 disables it */
  callTimeoutMs: number;
  retryPolicy?: RetryPolicy;
}

type RawRow = Record<string, unknown>;

const ROWID_COLUMN = '__rowid';

/**
 * RelationReader
 *
 * Streams the full contents of one source relation as typed flat records.
 * Rows are fetched in keyset pages over SQLite's rowid, so each read holds at
 * most one page in memory and yields rows in a stable order. No filtering and
 * no transformation: a row either matches its relation schema or the read fails.
 */
export class RelationReader {
  private readonly retry: RetryStrategy;

  constructor(
    private readonly connection: DatabaseConnection,
    private readonly options: RelationReaderOptions
  ) {
    this.retry = new RetryStrategy(options.retryPolicy ?? DATABASE_RETRY_POLICY);
  }

  tableFor(relation: RelationName): string {
    return this.options.tables[relation];
  }

  /**
   * Probe every relation with a zero-row select of the columns the build reads.
   * Throws SourceUnavailableError on the first relation (or column) that is missing.
   */
  async assertAvailable(relations: readonly RelationName[]): Promise<void> {
    for (const relation of relations) {
      const table = this.tableFor(relation);
      const sql = `SELECT ${columnsOf(relation).join(', ')} FROM ${table} LIMIT 0`;

      try {
        await withDeadline(this.connection.query(sql), this.options.callTimeoutMs, `probe ${relation}`);
      } catch (error) {
        throw new SourceUnavailableError(
          relation,
          `Relation '${relation}' (table '${table}') cannot be read: ${getErrorMessage(error)}`,
          { service: 'RelationReader', operation: 'assertAvailable', metadata: { table } },
          toError(error)
        );
      }
    }
  }

  async count(relation: RelationName): Promise<number> {
    const rows = await this.fetch(
      relation,
      `SELECT COUNT(*) AS total FROM ${this.tableFor(relation)}`,
      [],
      'count'
    );
    const total = rows[0]?.total;
    if (typeof total !== 'number') {
      throw new InvalidStateError('numeric COUNT(*)', typeof total, undefined, {
        service: 'RelationReader',
        operation: 'count',
        entityId: relation,
      });
    }
    return total;
  }

  /**
   * Lazily read every row of a relation. Single pass: each call starts a new scan.
   */
  async *read<R extends RelationName>(relation: R): AsyncGenerator<RelationRow<R>, void, undefined> {
    const table = this.tableFor(relation);
    const columns = columnsOf(relation).join(', ');
    const pageSize = this.options.pageSize;
    let lastRowId: number | undefined;
    let rowCount = 0;

    for (;;) {
      const page = lastRowId === undefined
        ? await this.fetch(
            relation,
            `SELECT rowid AS ${ROWID_COLUMN}, ${columns} FROM ${table} ORDER BY rowid LIMIT ?`,
            [pageSize],
            'read'
          )
        : await this.fetch(
            relation,
            `SELECT rowid AS ${ROWID_COLUMN}, ${columns} FROM ${table} WHERE rowid > ? ORDER BY rowid LIMIT ?`,
            [lastRowId, pageSize],
            'read'
          );

      for (const raw of page) {
        yield parseRow(relationSchemas[relation], raw, relation);
      }
      rowCount += page.length;

      const last = page[page.length - 1];
      if (page.length < pageSize || last === undefined) {
        break;
      }
      lastRowId = rowIdOf(last, relation);
    }

    logger.debug('Relation drained', { relation, table, rowCount });
  }

  private async fetch(
    relation: RelationName,
    sql: string,
    params: SqlParam[],
    operation: string
  ): Promise<RawRow[]> {
    try {
      return await this.retry.execute(
        () => withDeadline(this.connection.query<RawRow>(sql, params), this.options.callTimeoutMs, `${operation} ${relation}`),
        `${operation} ${relation}`
      );
    } catch (error) {
      if (error instanceof SourceUnavailableError) {
        throw error;
      }
      throw new SourceUnavailableError(
        relation,
        `Relation '${relation}' became unreadable: ${getErrorMessage(error)}`,
        { service: 'RelationReader', operation, metadata: { table: this.tableFor(relation) } },
        toError(error)
      );
    }
  }
}

function parseRow<S extends z.AnyZodObject>(schema: S, raw: RawRow, relation: RelationName): z.infer<S> {
  const result = schema.safeParse(raw);
  if (!result.success) {
    throw new SchemaValidationError(
      result.error.issues.map(issue => ({ path: issue.path.join('.'), message: issue.message })),
      `Row in relation '${relation}' does not match its expected columns`,
      {
        service: 'RelationReader',
        operation: 'read',
        entityType: 'relation',
        entityId: relation,
        metadata: { rowid: raw[ROWID_COLUMN] },
      }
    );
  }
  return result.data;
}

function rowIdOf(row: RawRow, relation: RelationName): number {
  const rowId = row[ROWID_COLUMN];
  if (typeof rowId !== 'number') {
    throw new InvalidStateError('numeric rowid', typeof rowId, `Relation '${relation}' has no usable rowid`, {
      service: 'RelationReader',
      operation: 'read',
      entityId: relation,
    });
  }
  return rowId;
}

/**
 * Drain a row stream into an array.
 */
export async function collectRows<T>(rows: AsyncIterable<T>): Promise<T[]> {
  const collected: T[] = [];
  for await (const row of rows) {
    collected.push(row);
  }
  return collected;
}
