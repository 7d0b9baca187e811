import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { Content, GoogleGenAI } from '@google/genai';
import { RAG_CONFIG_KEY, RagConfig } from '../../config/configuration';
import {
    EmbeddingError,
    GenerationError,
    OperationAbortedError,
    errorMessage,
    isAbortError,
} from '../../utils/errors';
import { EmbeddingProvider, GenerationProvider, GenerationRequest } from '../providers/types';

// embedContent accepts at most this many texts per request.
const EMBED_BATCH_SIZE = 100;

@Injectable()
export class GeminiService implements EmbeddingProvider, GenerationProvider {
    private readonly logger = new Logger(GeminiService.name);
    private genAI: GoogleGenAI | undefined;
    private readonly apiKey: string;
    private readonly chatModel: string;
    private readonly temperature: number;
    readonly model: string;

    constructor(private readonly configService: ConfigService) {
        const { gemini } = this.configService.getOrThrow<RagConfig>(RAG_CONFIG_KEY);
        this.apiKey = gemini.apiKey;
        this.model = gemini.embedModel;
        this.chatModel = gemini.chatModel;
        this.temperature = gemini.temperature;
    }

    private client(): GoogleGenAI {
        if (!this.genAI) {
            this.genAI = new GoogleGenAI({ apiKey: this.apiKey });
        }
        return this.genAI;
    }

    async embed(texts: string[], signal?: AbortSignal): Promise<number[][]> {
        const vectors: number[][] = [];
        for (let i = 0; i < texts.length; i += EMBED_BATCH_SIZE) {
            vectors.push(...(await this.embedBatch(texts.slice(i, i + EMBED_BATCH_SIZE), signal)));
        }
        return vectors;
    }

    private async embedBatch(batch: string[], signal?: AbortSignal): Promise<number[][]> {
        try {
            const result = await this.client().models.embedContent({
                model: this.model,
                contents: batch,
                config: { abortSignal: signal },
            });
            const embeddings = (result.embeddings ?? [])
                .map(item => item?.values)
                .filter((values): values is number[] => Array.isArray(values));
            if (embeddings.length !== batch.length) {
                throw new EmbeddingError(
                    `Embedding response held ${embeddings.length} vector(s) for ${batch.length} text(s)`,
                );
            }
            return embeddings;
        } catch (err) {
            if (err instanceof EmbeddingError) throw err;
            if (signal?.aborted || isAbortError(err)) throw new OperationAbortedError('embedding', { cause: err });
            this.logger.error(`Error generating embeddings: ${errorMessage(err)}`);
            throw new EmbeddingError(`Failed to generate embeddings: ${errorMessage(err)}`, { cause: err });
        }
    }

    async generate(request: GenerationRequest, signal?: AbortSignal): Promise<string> {
        // Gemini doesn't have a true 'system' role. Put it in a preamble (first user turn).
        const preamble = request.system.trim();
        const contents: Content[] = [
            ...(preamble ? [{ role: 'user', parts: [{ text: preamble }] }] : []),
            ...request.history.map(m => ({
                role: m.role === 'assistant' ? 'model' : 'user',
                parts: [{ text: m.content }],
            })),
            { role: 'user', parts: [{ text: request.user }] },
        ];

        try {
            const result = await this.client().models.generateContent({
                model: this.chatModel,
                contents,
                config: { temperature: request.temperature ?? this.temperature, abortSignal: signal },
            });
            const text = result.text;
            if (text === undefined) {
                throw new GenerationError('Generation response carried no text');
            }
            return text;
        } catch (err) {
            if (err instanceof GenerationError) throw err;
            if (signal?.aborted || isAbortError(err)) throw new OperationAbortedError('generation', { cause: err });
            this.logger.error(`complete error: ${errorMessage(err)}`);
            throw new GenerationError(`Failed to generate content: ${errorMessage(err)}`, { cause: err });
        }
    }
}
