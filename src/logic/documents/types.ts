export interface DocumentPage {
    /** 0-based page index within the source file. */
    page: number;
    text: string;
}

/** A source file as handed to ingestion; never persisted as such. */
export interface SourceDocument {
    filename: string;
    pages: DocumentPage[];
}

export interface Chunk {
    id: string;
    text: string;
    source: string;
    page: number;
    /** 0-based sequence number of the chunk within its document. */
    position: number;
    startChar: number;
    endChar: number;
}

export const SUPPORTED_EXTENSIONS = ['.pdf', '.docx', '.txt', '.md'] as const;
