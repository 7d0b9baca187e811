import 'reflect-metadata';
import { existsSync } from 'node:fs';
import { Logger } from '@nestjs/common';
import { DataSource } from 'typeorm';
import { loadRagConfig } from '../config/configuration';
import { buildDataSourceOptions } from '../database/database.options';
import { Message, Session } from '../entities';
import { SessionsService } from '../logic/sessions/sessions.service';
import { StoredMessage } from '../logic/sessions/types';
import { errorMessage } from '../utils/errors';

const logger = new Logger('CheckDb');

export function formatMessage(m: StoredMessage): string {
    const meta = m.metadata;
    const sources = meta?.kind === 'source_citations' ? ` [${meta.sources.length} source(s)]` : '';
    return `#${m.id} session=${m.sessionId ?? '-'} ${m.role}: ${m.content}${sources}`;
}

/** Prints the message count and the latest messages of the configured database. */
export async function checkDb(dbPath: string): Promise<string[]> {
    if (!existsSync(dbPath)) {
        return ['Database file does not exist.'];
    }
    const dataSource = await new DataSource(buildDataSourceOptions({ path: dbPath })).initialize();
    try {
        const sessions = new SessionsService(
            dataSource,
            dataSource.getRepository(Session),
            dataSource.getRepository(Message),
        );
        const { totalMessages, recent } = await sessions.stats();
        return [
            `Schema version: ${await sessions.schemaVersion()}`,
            `Total messages: ${totalMessages}`,
            `Last ${recent.length} messages:`,
            ...recent.map(formatMessage),
        ];
    } finally {
        await dataSource.destroy();
    }
}

if (require.main === module) {
    const { database } = loadRagConfig(process.env);
    checkDb(database.path)
        .then(lines => lines.forEach(line => console.log(line)))
        .catch(err => {
            logger.error(`Error reading database: ${errorMessage(err)}`);
            process.exitCode = 1;
        });
}
