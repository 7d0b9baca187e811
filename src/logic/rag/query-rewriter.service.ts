import { Inject, Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { RAG_CONFIG_KEY, RagConfig } from '../../config/configuration';
import { throwIfAborted } from '../../utils/errors';
import { ChatTurn, GENERATION_PROVIDER, GenerationProvider } from '../providers/types';
import { asGenerationError } from './generation-errors';
import { CONTEXTUALIZE_SYSTEM } from './prompts';
import { recentTurns } from './types';

const LABEL = /^(?:standalone\s+question|rewritten\s+question|reformulated\s+question|question)\s*:\s*/i;
const QUOTE_PAIRS = new Map([
    ['"', '"'],
    ["'", "'"],
    ['`', '`'],
    ['“', '”'],
    ['‘', '’'],
]);

/** Removes quote pairs that wrap the whole text; a lone or unmatched quote stays. */
function unwrapQuotes(text: string): string {
    let out = text;
    while (out.length >= 2 && QUOTE_PAIRS.get(out[0]) === out[out.length - 1]) {
        out = out.slice(1, -1).trim();
    }
    return out;
}

/** Strips labels and quotes a model tends to add; '' when nothing usable is left. */
export function cleanRewrite(raw: string): string {
    const text = unwrapQuotes(raw.trim().replace(LABEL, '').trim());
    return /[\p{L}\p{N}]/u.test(text) ? text : '';
}

@Injectable()
export class QueryRewriterService {
    private readonly logger = new Logger(QueryRewriterService.name);
    private readonly historyWindow: number;

    constructor(
        @Inject(GENERATION_PROVIDER)
        private readonly generator: GenerationProvider,
        private readonly configService: ConfigService,
    ) {
        this.historyWindow = this.configService.getOrThrow<RagConfig>(RAG_CONFIG_KEY).retrieval.historyWindow;
    }

    /** Turns a follow-up into a question that stands on its own for retrieval. */
    async rewrite(history: ChatTurn[], question: string, signal?: AbortSignal): Promise<string> {
        const recent = recentTurns(history, this.historyWindow);
        if (recent.length === 0) return question;
        throwIfAborted(signal, 'rewriting');

        let raw: string;
        try {
            raw = await this.generator.generate({ system: CONTEXTUALIZE_SYSTEM, history: recent, user: question, temperature: 0 }, signal);
        } catch (err) {
            throw asGenerationError(err, 'rewriting', signal);
        }

        const rewritten = cleanRewrite(raw);
        if (!rewritten) {
            this.logger.warn(`Rewriter returned nothing usable (${JSON.stringify(raw)}); searching with the original question`);
            return question;
        }
        this.logger.debug(`Rewrote "${question}" as "${rewritten}"`);
        return rewritten;
    }
}
