import { z } from 'zod';
import { MessageMetadata, SourceCitation } from './types';

const citationSchema = z.object({
    source: z.string(),
    page: z.number().int().nullable(),
    excerpt: z.string(),
});

const taggedSchema = z.object({
    kind: z.literal('source_citations'),
    sources: z.array(citationSchema),
});

// Shape written before metadata was tagged: {"sources": [{"source", "page", "content"}]}
const untaggedSchema = z.object({
    sources: z.array(
        z.object({
            source: z.string().optional(),
            page: z.union([z.number(), z.string()]).nullable().optional(),
            content: z.string().optional(),
        }),
    ),
});

export function encodeMetadata(metadata: MessageMetadata | null | undefined): string | null {
    if (!metadata) return null;
    switch (metadata.kind) {
        case 'source_citations':
            return JSON.stringify({
                kind: metadata.kind,
                sources: metadata.sources.map(({ source, page, excerpt }) => ({ source, page, excerpt })),
            });
        case 'unreadable':
            return metadata.raw;
    }
}

export function decodeMetadata(raw: string | null): MessageMetadata | null {
    if (raw === null || raw === '') return null;

    let value: unknown;
    try {
        value = JSON.parse(raw);
    } catch {
        return { kind: 'unreadable', raw };
    }

    const tagged = taggedSchema.safeParse(value);
    if (tagged.success) {
        return { kind: 'source_citations', sources: tagged.data.sources };
    }
    const untagged = untaggedSchema.safeParse(value);
    if (untagged.success) {
        const sources: SourceCitation[] = untagged.data.sources.map(s => ({
            source: s.source ?? 'Unknown file',
            page: typeof s.page === 'number' && Number.isInteger(s.page) ? s.page : null,
            excerpt: s.content ?? '',
        }));
        return { kind: 'source_citations', sources };
    }
    return { kind: 'unreadable', raw };
}
