import { Inject, Injectable } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import path from 'path';
import { RAG_CONFIG_KEY, RagConfig } from '../../config/configuration';
import { Chunk } from '../documents/types';
import { EMBEDDING_PROVIDER, EmbeddingProvider } from '../providers/types';
import { VectorIndex } from './vector-index';

/**
 * Hands out index handles for store directories. Handles are cached per
 * resolved directory so one process holds a single writer per store.
 */
@Injectable()
export class VectorStoreService {
    private readonly handles = new Map<string, Promise<VectorIndex>>();
    private readonly config: RagConfig['vectorStore'];

    constructor(
        private readonly configService: ConfigService,
        @Inject(EMBEDDING_PROVIDER)
        private readonly embedder: EmbeddingProvider,
    ) {
        this.config = this.configService.getOrThrow<RagConfig>(RAG_CONFIG_KEY).vectorStore;
    }

    get defaultLocation(): string {
        return path.resolve(this.config.dir);
    }

    /** Reopens a persisted index; throws IndexNotFoundError when there is none. */
    async open(location: string = this.defaultLocation): Promise<VectorIndex> {
        return this.cached(location, dir => VectorIndex.open(dir, this.embedder));
    }

    /**
     * Adds the chunks to the index at `location`, creating the index if needed.
     * Without chunks nothing is created: a missing index stays missing.
     */
    async build(chunks: Chunk[], location: string = this.defaultLocation, signal?: AbortSignal): Promise<VectorIndex> {
        if (chunks.length === 0) return this.open(location);
        const handle = await this.cached(location, dir =>
            VectorIndex.openOrCreate(dir, this.embedder, this.config.metric),
        );
        await handle.index(chunks, signal);
        return handle;
    }

    private async cached(location: string, load: (dir: string) => Promise<VectorIndex>): Promise<VectorIndex> {
        const dir = path.resolve(location);
        let pending = this.handles.get(dir);
        if (!pending) {
            pending = load(dir);
            this.handles.set(dir, pending);
            // A failed open must not poison later attempts.
            pending.catch(() => this.handles.delete(dir));
        }
        return pending;
    }
}
