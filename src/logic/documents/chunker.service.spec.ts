import { ConfigService } from '@nestjs/config';
import { loadRagConfig } from '../../config/configuration';
import { ChunkerService } from './chunker.service';

describe('ChunkerService', () => {
    const config = new ConfigService({ rag: loadRagConfig({ RAG_CHUNK_SIZE: '100', RAG_CHUNK_OVERLAP: '10' }) });
    const chunker = new ChunkerService(config);

    it('attributes chunks to their page and numbers them per document', () => {
        const paragraphs = `${'a'.repeat(60)}\n\n${'b'.repeat(60)}`;

        const chunks = chunker.split([
            {
                filename: 'guide.txt',
                pages: [
                    { page: 0, text: 'short first page' },
                    { page: 1, text: paragraphs },
                    { page: 2, text: '   ' },
                ],
            },
            { filename: 'other.md', pages: [{ page: 0, text: 'second document' }] },
        ]);

        expect(chunks.map(({ source, page, position, startChar, endChar }) => [source, page, position, startChar, endChar])).toEqual([
            ['guide.txt', 0, 0, 0, 16],
            ['guide.txt', 1, 1, 0, 62],
            ['guide.txt', 1, 2, 62, 122],
            ['other.md', 0, 0, 0, 15],
        ]);
        expect(chunks[2].text).toBe('b'.repeat(60));
        expect(new Set(chunks.map(c => c.id)).size).toBe(4);
    });

    it('keeps every chunk within the configured size', () => {
        const text = Array.from({ length: 80 }, (_, i) => `word${i}`).join(' ');

        const chunks = chunker.split([{ filename: 'long.txt', pages: [{ page: 0, text }] }]);

        expect(chunks.length).toBeGreaterThan(1);
        expect(chunks.every(c => c.text.length <= 100 && c.text.trim().length > 0)).toBe(true);
    });

    it('returns nothing for documents without text', () => {
        expect(chunker.split([{ filename: 'blank.txt', pages: [{ page: 0, text: '\n\n  ' }] }])).toEqual([]);
        expect(chunker.split([])).toEqual([]);
    });
});
