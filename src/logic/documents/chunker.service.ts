import { Injectable } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { v4 as uuidv4 } from 'uuid';
import { RAG_CONFIG_KEY, RagConfig } from '../../config/configuration';
import { splitIntoChunks } from '../../utils/textNormalizer';
import { Chunk, SourceDocument } from './types';

@Injectable()
export class ChunkerService {
    private readonly options: RagConfig['chunking'];

    constructor(private readonly configService: ConfigService) {
        const { chunkSize, chunkOverlap } = this.configService.getOrThrow<RagConfig>(RAG_CONFIG_KEY).chunking;
        this.options = { chunkSize, chunkOverlap };
    }

    /**
     * Splits every page of every document. Chunks never cross a page boundary,
     * and `position` counts the chunks of one document from 0.
     */
    split(documents: SourceDocument[]): Chunk[] {
        const chunks: Chunk[] = [];
        for (const doc of documents) {
            let position = 0;
            for (const page of doc.pages) {
                const spans = splitIntoChunks(page.text, {
                    chunkSize: this.options.chunkSize,
                    overlap: this.options.chunkOverlap,
                });
                for (const span of spans) {
                    chunks.push({
                        id: uuidv4(),
                        text: span.text,
                        source: doc.filename,
                        page: page.page,
                        position: position++,
                        startChar: span.startChar,
                        endChar: span.endChar,
                    });
                }
            }
        }
        return chunks;
    }
}
