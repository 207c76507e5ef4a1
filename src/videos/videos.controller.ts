import {
  Controller,
  Get,
  HttpCode,
  HttpStatus,
  Post,
  Query,
  UseGuards,
} from '@nestjs/common';
import {
  ApiExtraModels,
  ApiHeader,
  ApiOkResponse,
  ApiOperation,
  ApiTags,
} from '@nestjs/swagger';
import { VideosService } from './videos.service';
import { PopularVideosQueryDto, RegionQueryDto } from './dto/popular-videos.dto';
import { PopularVideosView } from './videos.types';
import { CategoryMap } from '../youtube/youtube.types';
import { SESSION_HEADER, SessionAuthGuard } from '../common/guards/session-auth.guard';

/**
 * 대시보드 화면이 호출하는 인기 동영상 API
 */
@ApiTags('Videos')
@ApiExtraModels(PopularVideosQueryDto)
@ApiHeader({ name: SESSION_HEADER, required: false, description: '로그인 게이트 사용 시 세션 토큰' })
@Controller('api/videos')
@UseGuards(SessionAuthGuard)
export class VideosController {
  constructor(private readonly videosService: VideosService) {}

  @Get('popular')
  @ApiOperation({
    summary: '인기 동영상 조회',
    description: '지역별 인기 동영상을 조회하고 검색어/카테고리/조회수 범위로 필터링합니다.',
  })
  @ApiOkResponse({
    description: '필터가 적용된 인기 동영상 목록',
    schema: {
      example: {
        status: 'ok',
        region: 'KR',
        totalCount: 30,
        filteredCount: 1,
        summary: '총 1개 동영상',
        filters: { searchText: '', categoryIds: [], viewCountRange: { min: 0, max: 1234567 } },
        options: { categories: [{ id: '10', name: '음악' }], viewRange: { min: 0, max: 1234567, step: 1000 } },
        items: [],
      },
    },
  })
  getPopular(@Query() query: PopularVideosQueryDto): Promise<PopularVideosView> {
    return this.videosService.getPopularVideos(query);
  }

  @Get('categories')
  @ApiOperation({ summary: '카테고리 이름 매핑 조회' })
  @ApiOkResponse({ schema: { example: { '10': '음악', '20': '게임' } } })
  getCategories(@Query() query: RegionQueryDto): Promise<CategoryMap> {
    return this.videosService.getCategories(query.region);
  }

  @Post('refresh')
  @HttpCode(HttpStatus.OK)
  @ApiOperation({ summary: '새로고침', description: '캐시된 조회 결과를 모두 비웁니다.' })
  refresh(): { cleared: number } {
    return this.videosService.refresh();
  }
}
