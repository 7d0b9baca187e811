import { Module } from '@nestjs/common';
import { GeminiModule } from '../gemini/gemini.module';
import { AnswererService } from './answerer.service';
import { QueryRewriterService } from './query-rewriter.service';

@Module({
    imports: [GeminiModule],
    providers: [QueryRewriterService, AnswererService],
    exports: [QueryRewriterService, AnswererService],
})
export class RagModule {}
