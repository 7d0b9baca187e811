import { ChatTurn } from '../providers/types';
import { SearchHit } from '../vector-store/vector-index';

export type PipelineStage = 'rewriting' | 'retrieving' | 'synthesizing' | 'done';

/** The part of an index the answerer needs. */
export interface SearchableIndex {
    search(query: string, k: number, signal?: AbortSignal): Promise<SearchHit[]>;
}

export interface AnswerResult {
    answer: string;
    /** Every retrieved chunk, best first, whether or not the answer used it. */
    sources: SearchHit[];
    standaloneQuestion: string;
}

export type StageEvent =
    | { stage: 'rewriting'; question: string; history: ChatTurn[] }
    | { stage: 'retrieving'; standaloneQuestion: string }
    | { stage: 'synthesizing'; standaloneQuestion: string; hits: SearchHit[] }
    | { stage: 'done'; result: AnswerResult };

export interface AnswerOptions {
    onStage?: (event: StageEvent) => void;
    signal?: AbortSignal;
    /** Overrides the configured number of chunks to retrieve. */
    k?: number;
}

/** The last `window` turns, oldest first. */
export function recentTurns(history: ChatTurn[], window: number): ChatTurn[] {
    return window > 0 ? history.slice(-window) : [];
}
