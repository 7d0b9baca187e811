import { Inject, Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { RAG_CONFIG_KEY, RagConfig } from '../../config/configuration';
import { throwIfAborted } from '../../utils/errors';
import { ChatTurn, GENERATION_PROVIDER, GenerationProvider } from '../providers/types';
import { SearchHit } from '../vector-store/vector-index';
import { asGenerationError } from './generation-errors';
import { buildAnswerSystem } from './prompts';
import { QueryRewriterService } from './query-rewriter.service';
import { AnswerOptions, AnswerResult, SearchableIndex, StageEvent, recentTurns } from './types';

/**
 * Grounded answering as a fixed sequence of stages:
 * rewriting, retrieving, synthesizing, done. The signal is checked between
 * stages and handed to every provider call.
 */
@Injectable()
export class AnswererService {
    private readonly logger = new Logger(AnswererService.name);
    private readonly retrieval: RagConfig['retrieval'];

    constructor(
        private readonly rewriter: QueryRewriterService,
        @Inject(GENERATION_PROVIDER)
        private readonly generator: GenerationProvider,
        private readonly configService: ConfigService,
    ) {
        this.retrieval = this.configService.getOrThrow<RagConfig>(RAG_CONFIG_KEY).retrieval;
    }

    async answer(
        question: string,
        history: ChatTurn[],
        index: SearchableIndex,
        options: AnswerOptions = {},
    ): Promise<AnswerResult> {
        const { signal } = options;
        const emit = (event: StageEvent) => options.onStage?.(event);
        const recent = recentTurns(history, this.retrieval.historyWindow);

        emit({ stage: 'rewriting', question, history: recent });
        const standaloneQuestion = await this.rewriter.rewrite(recent, question, signal);

        throwIfAborted(signal, 'retrieving');
        emit({ stage: 'retrieving', standaloneQuestion });
        const hits = await index.search(standaloneQuestion, options.k ?? this.retrieval.topK, signal);

        throwIfAborted(signal, 'synthesizing');
        emit({ stage: 'synthesizing', standaloneQuestion, hits });
        const answer = await this.synthesize(question, recent, hits, signal);

        const result: AnswerResult = { answer, sources: hits, standaloneQuestion };
        emit({ stage: 'done', result });
        return result;
    }

    private async synthesize(question: string, history: ChatTurn[], hits: SearchHit[], signal?: AbortSignal): Promise<string> {
        const context = hits.map(h => h.chunk.text).join('\n\n');
        this.logger.log(`Answering with ${hits.length} retrieved chunk(s)`);
        try {
            return await this.generator.generate({ system: buildAnswerSystem(context), history, user: question }, signal);
        } catch (err) {
            throw asGenerationError(err, 'synthesizing', signal);
        }
    }
}
