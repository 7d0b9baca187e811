import { Module } from '@nestjs/common';
import { VectorStoreModule } from '../vector-store/vector-store.module';
import { ChunkerService } from './chunker.service';
import { DocumentLoaderService } from './document-loader.service';
import { DocumentsController } from './documents.controller';
import { DocumentsService } from './documents.service';

@Module({
    imports: [VectorStoreModule],
    controllers: [DocumentsController],
    providers: [DocumentLoaderService, ChunkerService, DocumentsService],
    exports: [DocumentsService, DocumentLoaderService, ChunkerService],
})
export class DocumentsModule {}
