export const ROLES = ['user', 'assistant'] as const;

export type Role = (typeof ROLES)[number];

export interface SourceCitation {
    source: string;
    page: number | null;
    excerpt: string;
}

/**
 * What was recorded alongside a message.
 * `null` on a message means nothing was recorded, which is not the same as
 * recording an empty list of sources.
 */
export type MessageMetadata =
    | { kind: 'source_citations'; sources: SourceCitation[] }
    | { kind: 'unreadable'; raw: string };

export interface SessionSummary {
    id: number;
    title: string;
    createdAt: Date;
}

export interface StoredMessage {
    id: number;
    sessionId: number | null;
    // Rows written by older versions may carry roles outside `Role`.
    role: string;
    content: string;
    metadata: MessageMetadata | null;
    timestamp: Date;
}

export interface NewMessage {
    role: Role;
    content: string;
    metadata?: MessageMetadata | null;
}

export interface StoreStats {
    totalMessages: number;
    recent: StoredMessage[];
}

export function sourceCitations(sources: SourceCitation[]): MessageMetadata {
    return { kind: 'source_citations', sources };
}

export function isRole(value: string): value is Role {
    return value === 'user' || value === 'assistant';
}
