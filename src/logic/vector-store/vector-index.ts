import { Logger } from '@nestjs/common';
import fs from 'node:fs/promises';
import path from 'path';
import { v4 as uuidv4 } from 'uuid';
import { z } from 'zod';
import { SimilarityMetric } from '../../config/configuration';
import {
    EmbeddingError,
    IndexNotFoundError,
    RagError,
    errorMessage,
    throwIfAborted,
} from '../../utils/errors';
import { Chunk } from '../documents/types';
import { EmbeddingProvider } from '../providers/types';
import { norm, score } from './similarity';

export const MANIFEST_FILE = 'manifest.json';
export const CHUNKS_FILE = 'chunks.jsonl';
const FORMAT_VERSION = 1;

const manifestSchema = z.object({
    formatVersion: z.literal(FORMAT_VERSION),
    metric: z.enum(['cosine', 'inner_product']),
    embeddingModel: z.string(),
    createdAt: z.string(),
});

export type IndexManifest = z.infer<typeof manifestSchema>;

const chunkSchema = z.object({
    id: z.string(),
    text: z.string(),
    source: z.string(),
    page: z.number().int(),
    position: z.number().int(),
    startChar: z.number().int(),
    endChar: z.number().int(),
});

// One line of chunks.jsonl holds everything a single index() call stored.
const batchSchema = z.object({
    batchId: z.string(),
    createdAt: z.string(),
    records: z.array(z.object({ chunk: chunkSchema, embedding: z.array(z.number()) })),
});

type BatchLine = z.infer<typeof batchSchema>;

export interface SearchHit {
    chunk: Chunk;
    score: number;
}

interface IndexedRecord {
    chunk: Chunk;
    embedding: number[];
    norm: number;
}

// fs errors can come from another realm (e.g. a test sandbox), so match on the code alone.
function isNotFound(err: unknown): boolean {
    return typeof err === 'object' && err !== null && 'code' in err && err.code === 'ENOENT';
}

async function fileExists(file: string): Promise<boolean> {
    try {
        await fs.access(file);
        return true;
    } catch {
        return false;
    }
}

async function writeFileAtomic(file: string, contents: string): Promise<void> {
    const tmp = `${file}.${process.pid}.tmp`;
    const handle = await fs.open(tmp, 'w');
    try {
        await handle.writeFile(contents);
        await handle.sync();
    } finally {
        await handle.close();
    }
    await fs.rename(tmp, file);
}

async function appendDurably(file: string, contents: string): Promise<void> {
    const handle = await fs.open(file, 'a');
    try {
        await handle.writeFile(contents);
        await handle.sync();
    } finally {
        await handle.close();
    }
}

/**
 * A persisted collection of (embedding, chunk) pairs answering nearest-neighbour
 * queries by exhaustive scoring. The directory is a single-writer resource.
 */
export class VectorIndex {
    private static readonly logger = new Logger(VectorIndex.name);

    private constructor(
        readonly location: string,
        readonly manifest: IndexManifest,
        private readonly embedder: EmbeddingProvider,
        private records: IndexedRecord[],
    ) { }

    static async exists(location: string): Promise<boolean> {
        return fileExists(path.join(location, MANIFEST_FILE));
    }

    /** Reopens a persisted index without re-embedding anything. */
    static async open(location: string, embedder: EmbeddingProvider): Promise<VectorIndex> {
        const manifestPath = path.join(location, MANIFEST_FILE);
        let rawManifest: string;
        try {
            rawManifest = await fs.readFile(manifestPath, 'utf8');
        } catch (err) {
            if (isNotFound(err)) throw new IndexNotFoundError(location);
            throw err;
        }
        let manifest: IndexManifest;
        try {
            manifest = manifestSchema.parse(JSON.parse(rawManifest));
        } catch (err) {
            throw new RagError(`Unreadable index manifest at ${manifestPath}: ${errorMessage(err)}`, { cause: err });
        }
        if (manifest.embeddingModel !== embedder.model) {
            VectorIndex.logger.warn(
                `Index at ${location} was built with "${manifest.embeddingModel}", querying with "${embedder.model}"`,
            );
        }

        const records = await VectorIndex.loadRecords(path.join(location, CHUNKS_FILE));
        VectorIndex.logger.log(`Opened index at ${location} with ${records.length} chunk(s)`);
        return new VectorIndex(location, manifest, embedder, records);
    }

    /** Opens the index at `location`, creating an empty one first when none exists. */
    static async openOrCreate(
        location: string,
        embedder: EmbeddingProvider,
        metric: SimilarityMetric,
    ): Promise<VectorIndex> {
        if (!(await VectorIndex.exists(location))) {
            await fs.mkdir(location, { recursive: true });
            const manifest: IndexManifest = {
                formatVersion: FORMAT_VERSION,
                metric,
                embeddingModel: embedder.model,
                createdAt: new Date().toISOString(),
            };
            await writeFileAtomic(path.join(location, CHUNKS_FILE), '');
            await writeFileAtomic(path.join(location, MANIFEST_FILE), JSON.stringify(manifest, null, 2));
            VectorIndex.logger.log(`Created ${metric} index at ${location}`);
        }
        return VectorIndex.open(location, embedder);
    }

    private static async loadRecords(file: string): Promise<IndexedRecord[]> {
        let data: string;
        try {
            data = await fs.readFile(file, 'utf8');
        } catch (err) {
            if (isNotFound(err)) return [];
            throw err;
        }

        const lastNewline = data.lastIndexOf('\n');
        const complete = data.slice(0, lastNewline + 1);
        if (complete.length < data.length) {
            // A batch whose append never finished was never acknowledged; drop it.
            VectorIndex.logger.warn(`Discarding an incomplete trailing batch in ${file}`);
            await fs.truncate(file, Buffer.byteLength(complete, 'utf8'));
        }

        const records: IndexedRecord[] = [];
        const lines = complete.split('\n').filter(Boolean);
        lines.forEach((line, idx) => {
            let batch: BatchLine;
            try {
                batch = batchSchema.parse(JSON.parse(line));
            } catch (err) {
                throw new RagError(`Corrupt batch on line ${idx + 1} of ${file}: ${errorMessage(err)}`, { cause: err });
            }
            for (const { chunk, embedding } of batch.records) {
                records.push({ chunk, embedding, norm: norm(embedding) });
            }
        });
        return records;
    }

    get metric(): SimilarityMetric {
        return this.manifest.metric;
    }

    get dimension(): number | null {
        return this.records[0]?.embedding.length ?? null;
    }

    size(): number {
        return this.records.length;
    }

    /**
     * Embeds and stores the chunks. Nothing is persisted unless every chunk was
     * embedded; the batch is durable once this resolves.
     */
    async index(chunks: Chunk[], signal?: AbortSignal): Promise<void> {
        if (chunks.length === 0) return;
        throwIfAborted(signal, 'indexing');

        const vectors = await this.embed(chunks.map(c => c.text), signal);
        throwIfAborted(signal, 'indexing');

        const batch: BatchLine = {
            batchId: uuidv4(),
            createdAt: new Date().toISOString(),
            records: chunks.map((chunk, i) => ({ chunk, embedding: vectors[i] })),
        };
        await appendDurably(path.join(this.location, CHUNKS_FILE), `${JSON.stringify(batch)}\n`);

        for (const { chunk, embedding } of batch.records) {
            this.records.push({ chunk, embedding, norm: norm(embedding) });
        }
        VectorIndex.logger.log(`Indexed ${chunks.length} chunk(s) into ${this.location} (total ${this.records.length})`);
    }

    /** The `k` closest chunks, best first; ties keep insertion order. */
    async search(query: string, k: number, signal?: AbortSignal): Promise<SearchHit[]> {
        if (k <= 0 || this.records.length === 0) return [];
        throwIfAborted(signal, 'retrieval');

        const [queryVector] = await this.embed([query], signal);
        const queryNorm = norm(queryVector);
        return this.records
            .map((record, i) => ({ record, i, score: score(this.metric, queryVector, queryNorm, record.embedding, record.norm) }))
            .sort((a, b) => b.score - a.score || a.i - b.i)
            .slice(0, k)
            .map(({ record, score: s }) => ({ chunk: record.chunk, score: s }));
    }

    /** Drops every stored chunk; the manifest (metric, model) is kept. */
    async reset(): Promise<void> {
        await writeFileAtomic(path.join(this.location, CHUNKS_FILE), '');
        this.records = [];
        VectorIndex.logger.log(`Reset index at ${this.location}`);
    }

    private async embed(texts: string[], signal?: AbortSignal): Promise<number[][]> {
        let vectors: number[][];
        try {
            vectors = await this.embedder.embed(texts, signal);
        } catch (err) {
            if (err instanceof RagError) throw err;
            throwIfAborted(signal, 'embedding');
            throw new EmbeddingError(`Embedding provider failed: ${errorMessage(err)}`, { cause: err });
        }

        if (vectors.length !== texts.length) {
            throw new EmbeddingError(`Expected ${texts.length} embedding(s), got ${vectors.length}`);
        }
        const expected = this.dimension ?? vectors[0]?.length;
        for (const v of vectors) {
            if (v.length === 0 || v.length !== expected) {
                throw new EmbeddingError(`Embedding has dimension ${v.length}, expected ${expected}`);
            }
            if (!v.every(Number.isFinite)) {
                throw new EmbeddingError('Embedding contains non-finite values');
            }
        }
        return vectors;
    }
}
