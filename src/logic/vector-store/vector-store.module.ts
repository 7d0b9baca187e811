import { Module } from '@nestjs/common';
import { GeminiModule } from '../gemini/gemini.module';
import { VectorStoreService } from './vector-store.service';

@Module({
    imports: [GeminiModule],
    providers: [VectorStoreService],
    exports: [VectorStoreService],
})
export class VectorStoreModule {}
