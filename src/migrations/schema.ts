import { QueryRunner } from 'typeorm';

export const LEGACY_SESSION_TITLE = 'Legacy Session';
export const LEGACY_BACKUP_TABLE = 'messages_legacy_backup';

interface TableInfoRow {
    name: string;
}

export async function tableColumns(queryRunner: QueryRunner, table: string): Promise<Set<string>> {
    const rows: TableInfoRow[] = await queryRunner.query(`PRAGMA table_info("${table}")`);
    return new Set(rows.map(r => r.name));
}

export async function countRows(queryRunner: QueryRunner, sql: string, params: unknown[] = []): Promise<number> {
    const rows: { n: number }[] = await queryRunner.query(sql, params);
    return Number(rows[0]?.n ?? 0);
}

export async function createMessagesTable(queryRunner: QueryRunner): Promise<void> {
    await queryRunner.query(`
        CREATE TABLE IF NOT EXISTS "messages" (
            "id" INTEGER PRIMARY KEY AUTOINCREMENT,
            "session_id" INTEGER NOT NULL REFERENCES "sessions" ("id") ON DELETE CASCADE,
            "role" TEXT NOT NULL,
            "content" TEXT NOT NULL,
            "metadata" TEXT,
            "timestamp" DATETIME NOT NULL DEFAULT CURRENT_TIMESTAMP
        )
    `);
}

/** First backup table name not in use: messages_legacy_backup, then _2, _3, ... */
export async function freeBackupName(queryRunner: QueryRunner): Promise<string> {
    for (let n = 1; ; n++) {
        const name = n === 1 ? LEGACY_BACKUP_TABLE : `${LEGACY_BACKUP_TABLE}_${n}`;
        if (!(await queryRunner.hasTable(name))) return name;
    }
}
