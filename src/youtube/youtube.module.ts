import { Module } from '@nestjs/common';
import { HttpModule } from '@nestjs/axios';
import { ConfigModule } from '@nestjs/config';
import { YouTubeApiService } from './youtube-api.service';
import { YouTubeCacheService } from './youtube-cache.service';
import { YOUTUBE_COLLECTION } from './config/youtube.config';

@Module({
  imports: [
    HttpModule.register({
      timeout: YOUTUBE_COLLECTION.timeoutMs,
      maxRedirects: 3,
    }),
    ConfigModule,
  ],
  providers: [YouTubeApiService, YouTubeCacheService],
  exports: [YouTubeApiService, YouTubeCacheService],
})
export class YouTubeModule {}
