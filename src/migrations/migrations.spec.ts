import path from 'path';
import { DataSource } from 'typeorm';
import { makeTempDir, openTestDatabase, removeDir, seedRawDatabase } from '../testing/database';
import { SCHEMA_VERSION } from './index';

type Row = Record<string, unknown>;

async function rows(dataSource: DataSource, sql: string): Promise<Row[]> {
    return dataSource.query(sql);
}

async function columnNames(dataSource: DataSource, table: string): Promise<string[]> {
    const info: { name: string }[] = await dataSource.query(`PRAGMA table_info("${table}")`);
    return info.map(c => c.name);
}

const LEGACY_TABLE = `CREATE TABLE messages (
    id INTEGER PRIMARY KEY AUTOINCREMENT,
    role TEXT NOT NULL,
    content TEXT NOT NULL,
    timestamp DATETIME DEFAULT CURRENT_TIMESTAMP
)`;

describe('schema migrations', () => {
    let dir: string;
    let dbPath: string;
    const open: DataSource[] = [];

    async function openDb(): Promise<DataSource> {
        const ds = await openTestDatabase(dbPath);
        open.push(ds);
        return ds;
    }

    beforeEach(() => {
        dir = makeTempDir('migrations');
        dbPath = path.join(dir, 'chat.db');
    });

    afterEach(async () => {
        for (const ds of open.splice(0)) {
            if (ds.isInitialized) await ds.destroy();
        }
        removeDir(dir);
    });

    it('creates the current schema on an empty database', async () => {
        const ds = await openDb();

        expect(await columnNames(ds, 'sessions')).toEqual(['id', 'title', 'created_at']);
        expect(await columnNames(ds, 'messages')).toEqual([
            'id',
            'session_id',
            'role',
            'content',
            'metadata',
            'timestamp',
        ]);
        expect(await rows(ds, `SELECT COUNT(*) AS n FROM "migrations"`)).toEqual([{ n: SCHEMA_VERSION }]);
    });

    it('is a no-op when run again on a current schema', async () => {
        const first = await openDb();
        await first.query(`INSERT INTO "sessions" ("title") VALUES ('Chat 1')`);
        await first.query(`INSERT INTO "messages" ("session_id", "role", "content") VALUES (1, 'user', 'hi')`);
        const schemaBefore = await rows(first, `SELECT name, sql FROM sqlite_master ORDER BY name`);
        await first.destroy();

        const second = await openDb();

        expect(await rows(second, `SELECT name, sql FROM sqlite_master ORDER BY name`)).toEqual(schemaBefore);
        expect(await rows(second, `SELECT id, title FROM "sessions"`)).toEqual([{ id: 1, title: 'Chat 1' }]);
        expect(await rows(second, `SELECT session_id, role, content FROM "messages"`)).toEqual([
            { session_id: 1, role: 'user', content: 'hi' },
        ]);
        expect(await rows(second, `SELECT COUNT(*) AS n FROM "migrations"`)).toEqual([{ n: SCHEMA_VERSION }]);
    });

    it('moves legacy messages into a Legacy Session and keeps the backup', async () => {
        await seedRawDatabase(dbPath, [
            LEGACY_TABLE,
            `INSERT INTO messages (role, content, timestamp) VALUES ('user', 'Who wrote Hamlet?', '2024-01-01 10:00:00')`,
            `INSERT INTO messages (role, content, timestamp) VALUES ('assistant', 'William Shakespeare.', '2024-01-01 10:00:05')`,
            `INSERT INTO messages (role, content, timestamp) VALUES ('user', 'Thanks', '2024-01-01 10:01:00')`,
        ]);

        const ds = await openDb();

        expect(await rows(ds, `SELECT id, title FROM "sessions"`)).toEqual([{ id: 1, title: 'Legacy Session' }]);
        expect(
            await rows(ds, `SELECT session_id, role, content, metadata, timestamp FROM "messages" ORDER BY id`),
        ).toEqual([
            { session_id: 1, role: 'user', content: 'Who wrote Hamlet?', metadata: null, timestamp: '2024-01-01 10:00:00' },
            { session_id: 1, role: 'assistant', content: 'William Shakespeare.', metadata: null, timestamp: '2024-01-01 10:00:05' },
            { session_id: 1, role: 'user', content: 'Thanks', metadata: null, timestamp: '2024-01-01 10:01:00' },
        ]);
        expect(await rows(ds, `SELECT COUNT(*) AS n FROM "messages_legacy_backup"`)).toEqual([{ n: 3 }]);

        await ds.destroy();
        const reopened = await openDb();

        expect(await rows(reopened, `SELECT COUNT(*) AS n FROM "sessions"`)).toEqual([{ n: 1 }]);
        expect(await rows(reopened, `SELECT COUNT(*) AS n FROM "messages"`)).toEqual([{ n: 3 }]);
    });

    it('keeps rows linked to surviving sessions when only metadata is missing', async () => {
        await seedRawDatabase(dbPath, [
            `CREATE TABLE sessions (id INTEGER PRIMARY KEY AUTOINCREMENT, title TEXT NOT NULL, created_at DATETIME DEFAULT CURRENT_TIMESTAMP)`,
            `INSERT INTO sessions (title) VALUES ('Chat 1')`,
            `CREATE TABLE messages (id INTEGER PRIMARY KEY AUTOINCREMENT, session_id INTEGER, role TEXT NOT NULL, content TEXT NOT NULL, timestamp DATETIME DEFAULT CURRENT_TIMESTAMP)`,
            `INSERT INTO messages (session_id, role, content) VALUES (1, 'user', 'linked')`,
            `INSERT INTO messages (session_id, role, content) VALUES (42, 'user', 'orphaned')`,
            `INSERT INTO messages (session_id, role, content) VALUES (NULL, 'assistant', 'unlinked')`,
        ]);

        const ds = await openDb();

        expect(await rows(ds, `SELECT id, title FROM "sessions" ORDER BY id`)).toEqual([
            { id: 1, title: 'Chat 1' },
            { id: 2, title: 'Legacy Session' },
        ]);
        expect(await rows(ds, `SELECT session_id, content FROM "messages" ORDER BY id`)).toEqual([
            { session_id: 1, content: 'linked' },
            { session_id: 2, content: 'orphaned' },
            { session_id: 2, content: 'unlinked' },
        ]);
    });

    it('carries metadata over from a legacy table that has it', async () => {
        const citations = '{"kind":"source_citations","sources":[]}';
        await seedRawDatabase(dbPath, [
            `CREATE TABLE messages (id INTEGER PRIMARY KEY AUTOINCREMENT, role TEXT NOT NULL, content TEXT NOT NULL, metadata TEXT)`,
            `INSERT INTO messages (role, content, metadata) VALUES ('assistant', 'cited', '${citations}')`,
            `INSERT INTO messages (role, content) VALUES ('user', 'plain')`,
        ]);

        const ds = await openDb();

        expect(await rows(ds, `SELECT session_id, content, metadata FROM "messages" ORDER BY id`)).toEqual([
            { session_id: 1, content: 'cited', metadata: citations },
            { session_id: 1, content: 'plain', metadata: null },
        ]);
    });

    it('picks a fresh backup name when an older backup exists', async () => {
        await seedRawDatabase(dbPath, [
            `CREATE TABLE messages_legacy_backup (id INTEGER PRIMARY KEY, role TEXT, content TEXT)`,
            `INSERT INTO messages_legacy_backup (role, content) VALUES ('user', 'from an earlier upgrade')`,
            LEGACY_TABLE,
            `INSERT INTO messages (role, content) VALUES ('user', 'current legacy row')`,
        ]);

        const ds = await openDb();

        expect(await rows(ds, `SELECT content FROM "messages_legacy_backup"`)).toEqual([
            { content: 'from an earlier upgrade' },
        ]);
        expect(await rows(ds, `SELECT content FROM "messages_legacy_backup_2"`)).toEqual([
            { content: 'current legacy row' },
        ]);
    });

    it('refuses to migrate a legacy table it cannot copy without loss', async () => {
        await seedRawDatabase(dbPath, [
            `CREATE TABLE messages (id INTEGER PRIMARY KEY, role TEXT, body TEXT)`,
            `INSERT INTO messages (role, body) VALUES ('user', 'kept as is')`,
        ]);

        await expect(openTestDatabase(dbPath)).rejects.toThrow(
            'Legacy messages table has no "content" column; refusing to migrate',
        );

        const raw = new DataSource({ type: 'better-sqlite3', database: dbPath });
        await raw.initialize();
        open.push(raw);
        expect(await columnNames(raw, 'messages')).toEqual(['id', 'role', 'body']);
        expect(await rows(raw, `SELECT role, body FROM messages`)).toEqual([{ role: 'user', body: 'kept as is' }]);
        expect(
            await rows(raw, `SELECT name FROM sqlite_master WHERE name LIKE 'messages_legacy_backup%'`),
        ).toEqual([]);
    });

    it('refuses to migrate legacy rows without content', async () => {
        await seedRawDatabase(dbPath, [
            `CREATE TABLE messages (id INTEGER PRIMARY KEY, role TEXT, content TEXT)`,
            `INSERT INTO messages (role, content) VALUES ('user', 'complete')`,
            `INSERT INTO messages (role, content) VALUES ('assistant', NULL)`,
        ]);

        await expect(openTestDatabase(dbPath)).rejects.toThrow(
            '1 legacy message(s) have no role or content; refusing to migrate',
        );

        const raw = new DataSource({ type: 'better-sqlite3', database: dbPath });
        await raw.initialize();
        open.push(raw);
        expect(await rows(raw, `SELECT role, content FROM messages ORDER BY id`)).toEqual([
            { role: 'user', content: 'complete' },
            { role: 'assistant', content: null },
        ]);
        expect(
            await rows(raw, `SELECT name FROM sqlite_master WHERE name LIKE 'messages_legacy_backup%'`),
        ).toEqual([]);
    });
});
