import { Module } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';
import { VideosService } from './videos.service';
import { VideosController } from './videos.controller';
import { YouTubeModule } from '../youtube/youtube.module';
import { AuthModule } from '../auth/auth.module';

/**
 * 인기 동영상 대시보드 API 모듈
 */
@Module({
  imports: [ConfigModule, YouTubeModule, AuthModule],
  providers: [VideosService],
  controllers: [VideosController],
})
export class VideosModule {}
