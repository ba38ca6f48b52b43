import Database from 'better-sqlite3';
import { mkdirSync } from 'node:fs';
import { dirname } from 'node:path';

// Application
import {
    type DatabasePort,
    type SqlParameter,
    type StatementOutcome,
} from '../../../application/ports/outbound/persistence/database.port.js';
import {
    notFound,
    ok,
    storeError,
    type StoreResult,
} from '../../../application/ports/outbound/persistence/store-result.js';
import { type LoggerPort } from '../../../application/ports/outbound/logging/logger.port.js';

import { SCHEMA_STATEMENTS } from './sqlite.schema.js';

const IN_MEMORY = ':memory:';

export class SqliteDatabase implements DatabasePort {
    private connection: Database.Database | null = null;

    constructor(
        private readonly logger: LoggerPort,
        private readonly databasePath: string,
    ) {
        this.logger.info('Configuring SQLite database', { databasePath });
    }

    async connect(): Promise<void> {
        if (this.connection) return;

        if (this.databasePath !== IN_MEMORY) {
            mkdirSync(dirname(this.databasePath), { recursive: true });
        }

        this.logger.info('Opening SQLite database', { databasePath: this.databasePath });
        const connection = new Database(this.databasePath);
        connection.pragma('journal_mode = WAL');
        connection.pragma('foreign_keys = ON');
        for (const statement of SCHEMA_STATEMENTS) {
            connection.exec(statement);
        }
        this.connection = connection;
    }

    async disconnect(): Promise<void> {
        if (!this.connection) return;

        this.connection.close();
        this.connection = null;
        this.logger.info('SQLite database closed');
    }

    async execute(sql: string, params: SqlParameter[] = []): Promise<StoreResult<StatementOutcome>> {
        return this.withConnection((connection) => {
            const { changes } = connection.prepare<SqlParameter[]>(sql).run(...params);
            return ok({ changes });
        });
    }

    async queryOne<Row>(sql: string, params: SqlParameter[] = []): Promise<StoreResult<Row>> {
        return this.withConnection((connection) => {
            const row = connection.prepare<SqlParameter[], Row>(sql).get(...params);
            return row === undefined ? notFound<Row>() : ok(row);
        });
    }

    /**
     * Single place where driver exceptions are turned into tagged results
     */
    private withConnection<T>(
        operation: (connection: Database.Database) => StoreResult<T>,
    ): StoreResult<T> {
        if (!this.connection) {
            return storeError(new Error('SQLite database is not connected'));
        }

        try {
            return operation(this.connection);
        } catch (error) {
            return storeError(error);
        }
    }
}
