import { Injectable, Logger } from '@nestjs/common';
import { VectorIndex } from '../vector-store/vector-index';
import { VectorStoreService } from '../vector-store/vector-store.service';
import { ChunkerService } from './chunker.service';
import { DocumentLoaderService } from './document-loader.service';
import { SourceDocument } from './types';

export interface IngestRequest {
    paths?: string[];
    folder?: string;
    documents?: SourceDocument[];
}

export interface IngestSummary {
    location: string;
    documents: number;
    chunks: number;
    totalChunks: number;
}

@Injectable()
export class DocumentsService {
    private readonly logger = new Logger(DocumentsService.name);

    constructor(
        private readonly loader: DocumentLoaderService,
        private readonly chunker: ChunkerService,
        private readonly vectorStore: VectorStoreService,
    ) { }

    /** Chunks the documents and adds them to the index at `location` (the configured store by default). */
    async buildIndex(documents: SourceDocument[], location?: string, signal?: AbortSignal): Promise<VectorIndex> {
        const { index } = await this.indexDocuments(documents, location, signal);
        return index;
    }

    async buildIndexFromFiles(paths: string[], location?: string, signal?: AbortSignal): Promise<VectorIndex> {
        return this.buildIndex(await this.loader.loadMany(paths), location, signal);
    }

    /** Gathers documents from every part of the request and indexes them in one batch. */
    async ingest(request: IngestRequest, location?: string): Promise<IngestSummary> {
        const documents: SourceDocument[] = [...(request.documents ?? [])];
        if (request.paths?.length) {
            documents.push(...(await this.loader.loadMany(request.paths)));
        }
        if (request.folder) {
            documents.push(...(await this.loader.loadFolder(request.folder)));
        }

        const { index, added } = await this.indexDocuments(documents, location);
        return {
            location: index.location,
            documents: documents.length,
            chunks: added,
            totalChunks: index.size(),
        };
    }

    private async indexDocuments(
        documents: SourceDocument[],
        location?: string,
        signal?: AbortSignal,
    ): Promise<{ index: VectorIndex; added: number }> {
        const chunks = this.chunker.split(documents);
        this.logger.log(`Split ${documents.length} document(s) into ${chunks.length} chunk(s)`);
        const index = await this.vectorStore.build(chunks, location, signal);
        return { index, added: chunks.length };
    }
}
