import { Module } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';
import { AuthService } from './auth.service';
import { AuthController } from './auth.controller';
import { SessionStore } from './session.store';
import { SessionAuthGuard } from '../common/guards/session-auth.guard';

/**
 * 로그인 게이트 모듈
 * - AUTH_ENABLED=false 이면 모든 요청 통과
 */
@Module({
  imports: [ConfigModule],
  providers: [AuthService, SessionStore, SessionAuthGuard],
  controllers: [AuthController],
  exports: [AuthService, SessionAuthGuard],
})
export class AuthModule {}
