import { Module } from '@nestjs/common';
import { RagModule } from '../rag/rag.module';
import { SessionsModule } from '../sessions/sessions.module';
import { VectorStoreModule } from '../vector-store/vector-store.module';
import { ChatController } from './chat.controller';
import { ChatService } from './chat.service';

@Module({
    imports: [RagModule, SessionsModule, VectorStoreModule],
    controllers: [ChatController],
    providers: [ChatService],
    exports: [ChatService],
})
export class ChatModule {}
