import { type StoreResult } from './store-result.js';

export type SqlParameter = bigint | null | number | string;

export interface StatementOutcome {
    changes: number;
}

/**
 * Relational store the repositories talk to. Every call returns a tagged
 * result; a query that yields no row is `not-found`.
 */
export interface DatabasePort {
    connect(): Promise<void>;

    disconnect(): Promise<void>;

    /**
     * Run a statement that returns no rows
     */
    execute(sql: string, params?: SqlParameter[]): Promise<StoreResult<StatementOutcome>>;

    /**
     * Run a statement expected to return at most one row
     */
    queryOne<Row>(sql: string, params?: SqlParameter[]): Promise<StoreResult<Row>>;
}
