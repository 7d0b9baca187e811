export type TextSpan = {
    text: string;
    startChar: number;
    endChar: number;
};

export type SplitOptions = {
    chunkSize?: number;
    overlap?: number;
};

// Most preferred boundary first; the hard character cut is the last resort.
const BREAK_SEPARATORS = ['\n\n', '\n', '. ', '! ', '? ', '; ', ', ', ' '];

export function normalizeText(s: string): string {
    return s
        .replace(/\r\n/g, '\n')
        .replace(/\t/g, '  ')
        .replace(/[ \u00A0]+/g, ' ')
        .replace(/\n{3,}/g, '\n\n')
        .trim();
}

function findBreak(text: string, lowerBound: number, end: number): number {
    for (const sep of BREAK_SEPARATORS) {
        const idx = text.lastIndexOf(sep, end - sep.length);
        if (idx !== -1 && idx + sep.length >= lowerBound) {
            return idx + sep.length;
        }
    }
    return end;
}

function alignToWord(text: string, from: number, limit: number): number {
    if (from === 0 || /\s/.test(text[from - 1])) return from;
    let i = from;
    while (i < limit && !/\s/.test(text[i])) i++;
    if (i === limit) return from;
    while (i < limit && /\s/.test(text[i])) i++;
    return i;
}

/**
 * Splits text into overlapping windows of at most `chunkSize` characters.
 *
 * Each window ends on the best boundary found in its second half (paragraph,
 * line, sentence, clause, word) and falls back to a hard cut. The next window
 * starts `overlap` characters before the previous end, moved forward to the
 * next word start, so consecutive spans always touch or overlap.
 */
export function splitIntoChunks(text: string, opts: SplitOptions = {}): TextSpan[] {
    const chunkSize = opts.chunkSize ?? 1000;
    const overlap = opts.overlap ?? 200;
    if (chunkSize <= 0) throw new RangeError('chunkSize must be positive');
    if (overlap < 0 || overlap >= chunkSize) {
        throw new RangeError('overlap must be in [0, chunkSize)');
    }
    if (!text.trim()) return [];

    const spans: TextSpan[] = [];
    const minAdvance = Math.max(overlap + 1, Math.floor(chunkSize / 2));
    let start = 0;

    while (start < text.length) {
        const end = Math.min(text.length, start + chunkSize);
        const cut = end === text.length ? end : findBreak(text, start + Math.min(chunkSize, minAdvance), end);
        const slice = text.slice(start, cut);
        if (slice.trim()) {
            spans.push({ text: slice, startChar: start, endChar: cut });
        }
        if (cut === text.length) break;
        start = alignToWord(text, cut - overlap, cut);
    }
    return spans;
}

/** Display excerpt: the text itself when short enough, else its head followed by "...". */
export function toExcerpt(text: string, maxChars: number): string {
    if (text.length <= maxChars) return text;
    return `${text.slice(0, maxChars).trimEnd()}...`;
}
