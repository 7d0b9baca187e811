import { Injectable, Logger } from '@nestjs/common';
import { InjectRepository } from '@nestjs/typeorm';
import { DataSource, EntityManager, Repository } from 'typeorm';
import { Message, Session } from '../../entities';
import { UnknownSessionError } from '../../utils/errors';
import { decodeMetadata, encodeMetadata } from './message-metadata';
import {
    MessageMetadata,
    NewMessage,
    Role,
    SessionSummary,
    SourceCitation,
    StoreStats,
    StoredMessage,
    sourceCitations,
} from './types';

const RECENT_FOR_STATS = 5;

@Injectable()
export class SessionsService {
    private readonly logger = new Logger(SessionsService.name);

    constructor(
        private readonly dataSource: DataSource,
        @InjectRepository(Session)
        private readonly sessionRepository: Repository<Session>,
        @InjectRepository(Message)
        private readonly messageRepository: Repository<Message>,
    ) { }

    async createSession(title: string): Promise<number> {
        const session = await this.sessionRepository.save(this.sessionRepository.create({ title }));
        this.logger.log(`Created session ${session.id} "${title}"`);
        return session.id;
    }

    /** Creates a session, titled "Chat <n+1>" when no title is given. */
    async newSession(title?: string): Promise<number> {
        const effective = title?.trim() || `Chat ${(await this.sessionRepository.count()) + 1}`;
        return this.createSession(effective);
    }

    /** Returns the newest session, creating the first one when none exists. */
    async ensureDefaultSession(): Promise<SessionSummary> {
        const [newest] = await this.listSessions();
        if (newest) return newest;
        const id = await this.newSession();
        return this.getSessionOrThrow(id);
    }

    async listSessions(): Promise<SessionSummary[]> {
        const sessions = await this.sessionRepository.find({
            order: { createdAt: 'DESC', id: 'DESC' },
        });
        return sessions.map(toSummary);
    }

    async getSession(id: number): Promise<SessionSummary | null> {
        const session = await this.sessionRepository.findOne({ where: { id } });
        return session ? toSummary(session) : null;
    }

    async getSessionOrThrow(id: number): Promise<SessionSummary> {
        const session = await this.getSession(id);
        if (!session) throw new UnknownSessionError(id);
        return session;
    }

    /**
     * Removes the session and its messages. Unknown ids are ignored. Deleting
     * the last session leaves a fresh default one behind.
     */
    async deleteSession(id: number): Promise<void> {
        const deleted = await this.dataSource.transaction(async manager => {
            const messages = await manager.delete(Message, { sessionId: id });
            const sessions = await manager.delete(Session, { id });
            if (!sessions.affected) return false;
            this.logger.log(`Deleted session ${id} with ${messages.affected ?? 0} message(s)`);
            return true;
        });
        if (deleted && (await this.sessionRepository.count()) === 0) {
            await this.ensureDefaultSession();
        }
    }

    async appendMessage(
        sessionId: number,
        role: Role,
        content: string,
        metadata?: MessageMetadata | null,
    ): Promise<StoredMessage> {
        const [stored] = await this.appendTurn(sessionId, [{ role, content, metadata }]);
        return stored;
    }

    /**
     * Appends several messages in one transaction: either all of them are
     * stored, in the given order, or none is.
     */
    async appendTurn(sessionId: number, messages: NewMessage[]): Promise<StoredMessage[]> {
        return this.dataSource.transaction(async manager => {
            await this.assertSessionExists(manager, sessionId);
            const stored: StoredMessage[] = [];
            for (const m of messages) {
                const row = manager.create(Message, {
                    sessionId,
                    role: m.role,
                    content: m.content,
                    metadata: encodeMetadata(m.metadata),
                });
                stored.push(toStoredMessage(await manager.save(row)));
            }
            return stored;
        });
    }

    /** Records one message; `sources` (possibly empty) becomes citation metadata. */
    async recordTurn(
        sessionId: number,
        role: Role,
        text: string,
        sources?: SourceCitation[],
    ): Promise<StoredMessage> {
        return this.appendMessage(sessionId, role, text, sources ? sourceCitations(sources) : null);
    }

    /**
     * Messages of a session in replay order. With `limit`, only the most recent
     * `limit` messages, still oldest first.
     */
    async loadHistory(sessionId: number, limit?: number): Promise<StoredMessage[]> {
        if (limit === undefined) {
            const rows = await this.messageRepository.find({
                where: { sessionId },
                order: { timestamp: 'ASC', id: 'ASC' },
            });
            return rows.map(toStoredMessage);
        }
        if (limit <= 0) return [];
        const newestFirst = await this.messageRepository.find({
            where: { sessionId },
            order: { timestamp: 'DESC', id: 'DESC' },
            take: limit,
        });
        return newestFirst.reverse().map(toStoredMessage);
    }

    async getHistory(sessionId: number): Promise<StoredMessage[]> {
        return this.loadHistory(sessionId);
    }

    async stats(): Promise<StoreStats> {
        const [totalMessages, recent] = await Promise.all([
            this.messageRepository.count(),
            this.messageRepository.find({ order: { id: 'DESC' }, take: RECENT_FOR_STATS }),
        ]);
        return { totalMessages, recent: recent.map(toStoredMessage) };
    }

    /** Number of applied schema migrations. */
    async schemaVersion(): Promise<number> {
        const rows: { n: number }[] = await this.dataSource.query(`SELECT COUNT(*) AS n FROM "migrations"`);
        return Number(rows[0]?.n ?? 0);
    }

    private async assertSessionExists(manager: EntityManager, sessionId: number): Promise<void> {
        const exists = await manager.existsBy(Session, { id: sessionId });
        if (!exists) throw new UnknownSessionError(sessionId);
    }
}

function toSummary(session: Session): SessionSummary {
    return { id: session.id, title: session.title, createdAt: session.createdAt };
}

function toStoredMessage(row: Message): StoredMessage {
    return {
        id: row.id,
        sessionId: row.sessionId,
        role: row.role,
        content: row.content,
        metadata: decodeMetadata(row.metadata),
        timestamp: row.timestamp,
    };
}
