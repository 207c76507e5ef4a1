import { INestApplication } from '@nestjs/common';
import { DocumentBuilder, SwaggerModule } from '@nestjs/swagger';
import { SESSION_HEADER } from '../common/guards/session-auth.guard';

/**
 * Swagger 문서 구성 (/docs)
 */
export function setupSwagger(app: INestApplication): void {
  const config = new DocumentBuilder()
    .setTitle('Popular Videos API')
    .setDescription('YouTube 인기 동영상 대시보드 백엔드 API 명세입니다.')
    .setVersion('1.0.0')
    .addApiKey(
      {
        type: 'apiKey',
        in: 'header',
        name: SESSION_HEADER,
        description: '로그인 게이트 사용 시 /api/auth/login 에서 받은 토큰을 입력하세요.',
      },
      'session-token',
    )
    .build();

  const document = SwaggerModule.createDocument(app, config, {
    deepScanRoutes: true,
  });

  SwaggerModule.setup('docs', app, document, {
    swaggerOptions: {
      persistAuthorization: true,
      displayRequestDuration: true,
    },
    customSiteTitle: 'Popular Videos API Docs',
  });
}
