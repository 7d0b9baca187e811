import { registerAs } from '@nestjs/config';
import { z } from 'zod';

export const RAG_CONFIG_KEY = 'rag';

const intFromEnv = (fallback: number) => z.coerce.number().int().positive().default(fallback);

const envSchema = z
    .object({
        NODE_ENV: z.string().default('development'),
        PORT: intFromEnv(8787),
        DB_PATH: z.string().min(1).default('data/chat_history.db'),
        VECTOR_STORE_DIR: z.string().min(1).default('data/vector_store'),
        VECTOR_METRIC: z.enum(['cosine', 'inner_product']).default('cosine'),
        RAG_CHUNK_SIZE: intFromEnv(1000),
        RAG_CHUNK_OVERLAP: z.coerce.number().int().nonnegative().default(200),
        RAG_TOP_K: intFromEnv(4),
        RAG_HISTORY_WINDOW: intFromEnv(5),
        RAG_EXCERPT_CHARS: intFromEnv(200),
        GEMINI_API_KEY: z.string().default(''),
        GEMINI_EMBED_MODEL: z.string().min(1).default('text-embedding-004'),
        GEMINI_CHAT_MODEL: z.string().min(1).default('gemini-2.5-flash-lite'),
        GEMINI_TEMPERATURE: z.coerce.number().min(0).max(2).default(0),
    })
    .refine((env) => env.RAG_CHUNK_OVERLAP < env.RAG_CHUNK_SIZE, {
        message: 'RAG_CHUNK_OVERLAP must be smaller than RAG_CHUNK_SIZE',
        path: ['RAG_CHUNK_OVERLAP'],
    });

export type SimilarityMetric = 'cosine' | 'inner_product';

export interface RagConfig {
    env: string;
    port: number;
    database: { path: string };
    vectorStore: { dir: string; metric: SimilarityMetric };
    chunking: { chunkSize: number; chunkOverlap: number };
    retrieval: { topK: number; historyWindow: number; excerptChars: number };
    gemini: { apiKey: string; embedModel: string; chatModel: string; temperature: number };
}

/**
 * Parses raw environment values into the typed config tree.
 * Throws with every offending variable listed when validation fails.
 */
export function loadRagConfig(env: Record<string, string | undefined>): RagConfig {
    const parsed = envSchema.safeParse(env);
    if (!parsed.success) {
        const issues = parsed.error.issues
            .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
            .join('; ');
        throw new Error(`Invalid configuration: ${issues}`);
    }
    const e = parsed.data;
    return {
        env: e.NODE_ENV,
        port: e.PORT,
        database: { path: e.DB_PATH },
        vectorStore: { dir: e.VECTOR_STORE_DIR, metric: e.VECTOR_METRIC },
        chunking: { chunkSize: e.RAG_CHUNK_SIZE, chunkOverlap: e.RAG_CHUNK_OVERLAP },
        retrieval: {
            topK: e.RAG_TOP_K,
            historyWindow: e.RAG_HISTORY_WINDOW,
            excerptChars: e.RAG_EXCERPT_CHARS,
        },
        gemini: {
            apiKey: e.GEMINI_API_KEY,
            embedModel: e.GEMINI_EMBED_MODEL,
            chatModel: e.GEMINI_CHAT_MODEL,
            temperature: e.GEMINI_TEMPERATURE,
        },
    };
}

export const ragConfig = registerAs(RAG_CONFIG_KEY, () => loadRagConfig(process.env));
