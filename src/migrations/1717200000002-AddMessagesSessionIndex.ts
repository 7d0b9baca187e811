import { MigrationInterface, QueryRunner } from 'typeorm';

export class AddMessagesSessionIndex1717200000002 implements MigrationInterface {
    name = 'AddMessagesSessionIndex1717200000002';

    async up(queryRunner: QueryRunner): Promise<void> {
        await queryRunner.query(
            `CREATE INDEX IF NOT EXISTS "IDX_messages_session_timestamp" ON "messages" ("session_id", "timestamp")`,
        );
    }

    async down(queryRunner: QueryRunner): Promise<void> {
        await queryRunner.query(`DROP INDEX IF EXISTS "IDX_messages_session_timestamp"`);
    }
}
