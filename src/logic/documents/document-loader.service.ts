import { Injectable, Logger } from '@nestjs/common';
import fg from 'fast-glob';
import mammoth from 'mammoth';
import { readFile } from 'node:fs/promises';
import path from 'path';
import { UnsupportedDocumentError } from '../../utils/errors';
import { normalizeText } from '../../utils/textNormalizer';
import { DocumentPage, SourceDocument, SUPPORTED_EXTENSIONS } from './types';

type SupportedExtension = (typeof SUPPORTED_EXTENSIONS)[number];

function isSupported(ext: string): ext is SupportedExtension {
    return SUPPORTED_EXTENSIONS.some(e => e === ext);
}

function toPages(texts: string[]): DocumentPage[] {
    return texts.map((text, page) => ({ page, text: normalizeText(text) }));
}

@Injectable()
export class DocumentLoaderService {
    private readonly logger = new Logger(DocumentLoaderService.name);

    /** Reads one file into page-ordered text; pages are numbered from 0. */
    async load(filePath: string): Promise<SourceDocument> {
        const ext = path.extname(filePath).toLowerCase();
        if (!isSupported(ext)) {
            throw new UnsupportedDocumentError(filePath, ext);
        }

        const pages = await this.readPages(filePath, ext);
        return { filename: path.basename(filePath), pages };
    }

    async loadMany(filePaths: string[]): Promise<SourceDocument[]> {
        const documents: SourceDocument[] = [];
        for (const file of filePaths) {
            documents.push(await this.load(file));
        }
        return documents;
    }

    /** Loads every supported file below `folder`, in path order. */
    async loadFolder(folder: string): Promise<SourceDocument[]> {
        const pattern = `${fg.convertPathToPattern(path.resolve(folder))}/**/*.{pdf,docx,txt,md}`;
        const files = (await fg(pattern, { caseSensitiveMatch: false })).sort();
        this.logger.log(`Found ${files.length} file(s) in ${folder}`);
        return this.loadMany(files);
    }

    private async readPages(filePath: string, ext: SupportedExtension): Promise<DocumentPage[]> {
        switch (ext) {
            case '.pdf':
                return toPages(await this.readPdfPages(filePath));
            case '.docx': {
                const res = await mammoth.extractRawText({ path: filePath });
                return toPages([res.value || '']);
            }
            case '.txt':
            case '.md': {
                const raw = await readFile(filePath, 'utf8');
                return toPages(raw.split('\f'));
            }
        }
    }

    private async readPdfPages(filePath: string): Promise<string[]> {
        // pdf.js is heavy; load it only when a PDF is actually read.
        const { PDFParse } = await import('pdf-parse');
        const parser = new PDFParse({ data: new Uint8Array(await readFile(filePath)) });
        try {
            const result = await parser.getText();
            return [...result.pages].sort((a, b) => a.num - b.num).map(p => p.text);
        } finally {
            await parser.destroy();
        }
    }
}
