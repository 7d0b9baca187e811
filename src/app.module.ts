import { Module } from '@nestjs/common';
import { ConfigModule, ConfigService } from '@nestjs/config';
import { TypeOrmModule } from '@nestjs/typeorm';
import { RAG_CONFIG_KEY, RagConfig, ragConfig } from './config/configuration';
import { buildDataSourceOptions } from './database/database.options';
import { ChatModule } from './logic/chat/chat.module';
import { DocumentsModule } from './logic/documents/documents.module';
import { GeminiModule } from './logic/gemini/gemini.module';
import { RagModule } from './logic/rag/rag.module';
import { SessionsModule } from './logic/sessions/sessions.module';
import { VectorStoreModule } from './logic/vector-store/vector-store.module';

@Module({
  imports: [
    ConfigModule.forRoot({ isGlobal: true, load: [ragConfig] }),
    TypeOrmModule.forRootAsync({
      imports: [ConfigModule],
      useFactory: (configService: ConfigService) => {
        const config = configService.getOrThrow<RagConfig>(RAG_CONFIG_KEY);
        return buildDataSourceOptions({
          path: config.database.path,
          logging: config.env === 'development',
        });
      },
      inject: [ConfigService],
    }),
    GeminiModule,
    VectorStoreModule,
    DocumentsModule,
    RagModule,
    SessionsModule,
    ChatModule,
  ],
})
export class AppModule {}
