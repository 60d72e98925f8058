import { DatabaseConfig } from '../config/database.js';
import type { ConsolidatedRecord } from '../models/extraction.js';
import { createLogger } from '../utils/logger.js';
import type { RecordSink, RecordWriteResult } from './RecordSink.js';

/**
 * The slice of a pg Pool the sink needs
 */
export interface Queryable {
  query(text: string, values: unknown[]): Promise<{ rows: unknown[] }>;
}

// Version is computed in the same statement; a concurrent writer that
// claims it first makes this insert hit the primary key and retry.
const INSERT_RECORD = `
  INSERT INTO consolidated_records (document_id, version, record_id, status, record, created_at)
  SELECT $1, COALESCE(MAX(version), 0) + 1, $2, $3, $4, $5
  FROM consolidated_records
  WHERE document_id = $1
  RETURNING version
`;

const UNIQUE_VIOLATION = '23505';
const MAX_WRITE_ATTEMPTS = 3;

function isUniqueViolation(error: unknown): boolean {
  return typeof error === 'object' && error !== null && 'code' in error && error.code === UNIQUE_VIOLATION;
}

function readVersion(row: unknown): number {
  if (typeof row === 'object' && row !== null && 'version' in row) {
    const version = Number(row.version);
    if (Number.isInteger(version) && version > 0) {
      return version;
    }
  }
  throw new Error('Insert returned no version');
}

/**
 * PostgreSQL Record Sink
 *
 * Insert-only: every write adds row (document_id, max(version) + 1).
 * Table definition: sql/consolidated_records.sql
 */
export class PostgresRecordSink implements RecordSink {
  private logger = createLogger('PostgresRecordSink');
  private db: Queryable;

  constructor(db?: Queryable) {
    this.db = db ?? {
      query: (text, values) => DatabaseConfig.getPool().query(text, values),
    };
  }

  async write(documentId: string, record: ConsolidatedRecord): Promise<RecordWriteResult> {
    const values = [documentId, record.recordId, record.status, JSON.stringify(record), record.createdAt];

    for (let attempt = 1; ; attempt++) {
      try {
        const result = await this.db.query(INSERT_RECORD, values);
        const version = readVersion(result.rows[0]);
        this.logger.info('Record inserted', { documentId, version, recordId: record.recordId });
        return { version };
      } catch (error) {
        if (!isUniqueViolation(error) || attempt >= MAX_WRITE_ATTEMPTS) {
          throw error;
        }
        this.logger.warn('Version conflict, retrying insert', { documentId, attempt });
      }
    }
  }
}
