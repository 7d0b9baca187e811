import 'reflect-metadata';
import { Logger, ValidationPipe } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { HttpAdapterHost, NestFactory } from '@nestjs/core';
import { AppModule } from './app.module';
import { RagExceptionFilter } from './common/rag-exception.filter';
import { RAG_CONFIG_KEY, RagConfig } from './config/configuration';
import { SessionsService } from './logic/sessions/sessions.service';

async function bootstrap() {
  const app = await NestFactory.create(AppModule);
  const config = app.get(ConfigService).getOrThrow<RagConfig>(RAG_CONFIG_KEY);

  app.enableCors();
  app.useGlobalPipes(new ValidationPipe({ whitelist: true, transform: true }));
  app.useGlobalFilters(new RagExceptionFilter(app.get(HttpAdapterHost)));
  app.enableShutdownHooks();

  const sessions = app.get(SessionsService);
  const session = await sessions.ensureDefaultSession();
  Logger.log(`Schema version ${await sessions.schemaVersion()}; current session ${session.id} "${session.title}"`, 'Bootstrap');

  await app.listen(config.port);
  Logger.log(`Listening on port ${config.port}`, 'Bootstrap');
}

bootstrap().catch(err => {
  Logger.error(err instanceof Error ? err.stack ?? err.message : String(err), 'Bootstrap');
  process.exit(1);
});
