import { mkdirSync } from 'node:fs';
import path from 'path';
import { DataSourceOptions } from 'typeorm';
import { Message, Session } from '../entities';
import { MIGRATIONS } from '../migrations';

export interface DatabaseOptionsInput {
    path: string;
    logging?: boolean;
}

/**
 * SQLite data source shared by the Nest app, the maintenance script and tests.
 * The schema is owned by the migrations; TypeORM never synchronizes it.
 */
export function buildDataSourceOptions(input: DatabaseOptionsInput): DataSourceOptions {
    if (input.path !== ':memory:') {
        mkdirSync(path.dirname(path.resolve(input.path)), { recursive: true });
    }
    return {
        type: 'better-sqlite3',
        database: input.path,
        entities: [Session, Message],
        migrations: MIGRATIONS,
        migrationsRun: true,
        migrationsTransactionMode: 'each',
        synchronize: false,
        logging: input.logging ?? false,
    };
}
