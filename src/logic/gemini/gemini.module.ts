import { Module } from '@nestjs/common';
import { GeminiService } from './gemini.service';
import { EMBEDDING_PROVIDER, GENERATION_PROVIDER } from '../providers/types';

@Module({
    providers: [
        GeminiService,
        { provide: EMBEDDING_PROVIDER, useExisting: GeminiService },
        { provide: GENERATION_PROVIDER, useExisting: GeminiService },
    ],
    exports: [EMBEDDING_PROVIDER, GENERATION_PROVIDER],
})
export class GeminiModule {}
