import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { RAG_CONFIG_KEY, RagConfig } from '../../config/configuration';
import { toExcerpt } from '../../utils/textNormalizer';
import { ChatTurn } from '../providers/types';
import { AnswererService } from '../rag/answerer.service';
import { SearchableIndex } from '../rag/types';
import { SessionsService } from '../sessions/sessions.service';
import { SourceCitation, StoredMessage, isRole, sourceCitations } from '../sessions/types';
import { SearchHit } from '../vector-store/vector-index';

export interface ChatAnswer {
    answer: string;
    sources: SourceCitation[];
}

/** Stored messages as prompt turns; rows with roles the prompt cannot carry are skipped. */
export function toChatTurns(messages: StoredMessage[]): ChatTurn[] {
    const turns: ChatTurn[] = [];
    for (const m of messages) {
        if (isRole(m.role)) turns.push({ role: m.role, content: m.content });
    }
    return turns;
}

@Injectable()
export class ChatService {
    private readonly logger = new Logger(ChatService.name);
    private readonly retrieval: RagConfig['retrieval'];

    constructor(
        private readonly answerer: AnswererService,
        private readonly sessions: SessionsService,
        private readonly configService: ConfigService,
    ) {
        this.retrieval = this.configService.getOrThrow<RagConfig>(RAG_CONFIG_KEY).retrieval;
    }

    /**
     * Answers `question` against `index` and records the exchange.
     * Both messages are stored together, and only once generation has returned;
     * a failed or aborted call leaves the session unchanged.
     * Without `history`, the session's own recent messages are used.
     */
    async ask(
        index: SearchableIndex,
        question: string,
        history: ChatTurn[] | undefined,
        sessionId: number,
        signal?: AbortSignal,
    ): Promise<ChatAnswer> {
        await this.sessions.getSessionOrThrow(sessionId);
        const turns = history ?? toChatTurns(await this.sessions.loadHistory(sessionId, this.retrieval.historyWindow));

        const result = await this.answerer.answer(question, turns, index, { signal });
        const sources = result.sources.map(h => this.toCitation(h));

        await this.sessions.appendTurn(sessionId, [
            { role: 'user', content: question },
            { role: 'assistant', content: result.answer, metadata: sourceCitations(sources) },
        ]);
        this.logger.log(`Answered in session ${sessionId} citing ${sources.length} source(s)`);
        return { answer: result.answer, sources };
    }

    private toCitation({ chunk }: SearchHit): SourceCitation {
        return { source: chunk.source, page: chunk.page, excerpt: toExcerpt(chunk.text, this.retrieval.excerptChars) };
    }
}
