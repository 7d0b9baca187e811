import { Role } from '../sessions/types';

export const EMBEDDING_PROVIDER = Symbol('EMBEDDING_PROVIDER');
export const GENERATION_PROVIDER = Symbol('GENERATION_PROVIDER');

export interface ChatTurn {
    role: Role;
    content: string;
}

export interface EmbeddingProvider {
    /** Identifies the vector space; indexes refuse to mix models. */
    readonly model: string;
    /** One vector per input text, in input order. */
    embed(texts: string[], signal?: AbortSignal): Promise<number[][]>;
}

export interface GenerationRequest {
    system: string;
    history: ChatTurn[];
    user: string;
    temperature?: number;
}

export interface GenerationProvider {
    generate(request: GenerationRequest, signal?: AbortSignal): Promise<string>;
}
