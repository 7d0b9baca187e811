import { Logger } from '@nestjs/common';
import { MigrationInterface, QueryRunner } from 'typeorm';
import { MigrationIntegrityError } from '../utils/errors';
import {
    LEGACY_SESSION_TITLE,
    countRows,
    createMessagesTable,
    freeBackupName,
    tableColumns,
} from './schema';

/**
 * Brings the messages table to the session-linked shape.
 *
 * A messages table that predates session linkage or metadata support is renamed
 * to a backup table, which is kept, and every row is copied into the new table.
 * Rows whose session still exists stay in it; all others land in a new
 * "Legacy Session". The whole migration runs in one transaction, so a failed
 * integrity check leaves the database as it was.
 */
export class UpgradeMessagesTable1717200000001 implements MigrationInterface {
    name = 'UpgradeMessagesTable1717200000001';

    private readonly logger = new Logger(UpgradeMessagesTable1717200000001.name);

    async up(queryRunner: QueryRunner): Promise<void> {
        if (!(await queryRunner.hasTable('messages'))) {
            await createMessagesTable(queryRunner);
            return;
        }

        const columns = await tableColumns(queryRunner, 'messages');
        if (columns.has('session_id') && columns.has('metadata')) {
            return;
        }
        for (const required of ['role', 'content']) {
            if (!columns.has(required)) {
                throw new MigrationIntegrityError(
                    `Legacy messages table has no "${required}" column; refusing to migrate`,
                );
            }
        }
        const incomplete = await countRows(
            queryRunner,
            `SELECT COUNT(*) AS n FROM "messages" WHERE "role" IS NULL OR "content" IS NULL`,
        );
        if (incomplete > 0) {
            throw new MigrationIntegrityError(
                `${incomplete} legacy message(s) have no role or content; refusing to migrate`,
            );
        }

        this.logger.log('Migrating legacy messages table...');
        const backup = await freeBackupName(queryRunner);
        await queryRunner.query(`ALTER TABLE "messages" RENAME TO "${backup}"`);
        await createMessagesTable(queryRunner);

        await queryRunner.query(`INSERT INTO "sessions" ("title") VALUES (?)`, [LEGACY_SESSION_TITLE]);
        const [{ id: legacySessionId }]: { id: number }[] = await queryRunner.query(
            `SELECT last_insert_rowid() AS id`,
        );

        const sessionExpr = columns.has('session_id')
            ? `CASE WHEN b."session_id" IN (SELECT "id" FROM "sessions") THEN b."session_id" ELSE ? END`
            : '?';
        const timestampExpr = columns.has('timestamp')
            ? `COALESCE(b."timestamp", CURRENT_TIMESTAMP)`
            : 'CURRENT_TIMESTAMP';
        const metadataExpr = columns.has('metadata') ? 'b."metadata"' : 'NULL';
        await queryRunner.query(
            `INSERT INTO "messages" ("session_id", "role", "content", "metadata", "timestamp")
             SELECT ${sessionExpr}, b."role", b."content", ${metadataExpr}, ${timestampExpr}
             FROM "${backup}" b ORDER BY b.rowid`,
            [legacySessionId],
        );

        const expected = await countRows(queryRunner, `SELECT COUNT(*) AS n FROM "${backup}"`);
        const copied = await countRows(queryRunner, `SELECT COUNT(*) AS n FROM "messages"`);
        if (copied !== expected) {
            throw new MigrationIntegrityError(
                `Copied ${copied} of ${expected} legacy messages; rolling back`,
            );
        }
        this.logger.log(
            `Migration complete. ${copied} message(s) moved out of "${backup}" (kept as backup).`,
        );
    }

    async down(): Promise<void> {
        throw new MigrationIntegrityError(
            'UpgradeMessagesTable cannot be reverted without discarding messages; restore from the backup table by hand',
        );
    }
}
