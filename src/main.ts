// src/main.ts
import 'reflect-metadata';
import { NestFactory } from '@nestjs/core';
import { Logger } from '@nestjs/common';
import { AppModule } from './app.module';
import { REQ_ID_HEADER } from './common/middleware/request-id.middleware';
import { SESSION_HEADER } from './common/guards/session-auth.guard';
import { setupSwagger } from './swagger/swagger.config';

async function bootstrap(): Promise<void> {
  const app = await NestFactory.create(AppModule, { bufferLogs: true });
  app.useLogger(new Logger());

  // 미들웨어/필터/인터셉터/파이프는 AppModule 에서 전역 등록

  app.enableCors({
    origin: (process.env.CORS_ORIGINS ?? 'http://localhost:3000')
      .split(',')
      .map((o) => o.trim())
      .filter(Boolean),
    credentials: true,
    methods: ['GET', 'POST', 'OPTIONS'],
    allowedHeaders: ['Content-Type', 'Authorization', REQ_ID_HEADER, SESSION_HEADER],
  });

  const port = Number(process.env.PORT ?? 8080);

  // Swagger 문서 구성
  setupSwagger(app);

  await app.listen(port);

  const logger = new Logger('Bootstrap');
  logger.log(`🚀 Server listening on http://localhost:${port}`);
}

bootstrap().catch((error: unknown) => {
  const logger = new Logger('Bootstrap');
  logger.error(`❌ 서버 시작 실패: ${error instanceof Error ? error.message : String(error)}`);
  process.exit(1);
});
