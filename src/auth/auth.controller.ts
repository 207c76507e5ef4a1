import {
  Body,
  Controller,
  Get,
  HttpCode,
  HttpStatus,
  Post,
  Req,
  UseGuards,
} from '@nestjs/common';
import {
  ApiBody,
  ApiHeader,
  ApiOkResponse,
  ApiOperation,
  ApiTags,
} from '@nestjs/swagger';
import { AuthService } from './auth.service';
import { LoginDto, LoginResponseDto, SessionInfoDto } from './dto/login.dto';
import {
  SESSION_HEADER,
  SessionAuthGuard,
  extractSessionToken,
} from '../common/guards/session-auth.guard';
import { RequestWithContext } from '../common/interfaces/request-context.interface';

@ApiTags('Auth')
@Controller('api/auth')
export class AuthController {
  constructor(private readonly authService: AuthService) {}

  @Post('login')
  @HttpCode(HttpStatus.OK)
  @ApiOperation({ summary: '로그인', description: '설정된 사용자/비밀번호로 세션 토큰을 발급합니다.' })
  @ApiBody({ type: LoginDto })
  @ApiOkResponse({
    description: '세션 토큰',
    schema: { example: { token: 'uuid', username: 'demo', createdAt: '2025-10-21T12:00:00.000Z' } },
  })
  login(@Body() dto: LoginDto): LoginResponseDto {
    const session = this.authService.login(dto.username, dto.password);
    return {
      token: session.token,
      username: session.username,
      createdAt: session.createdAt,
    };
  }

  @Post('logout')
  @HttpCode(HttpStatus.OK)
  @ApiOperation({ summary: '로그아웃' })
  @ApiHeader({ name: SESSION_HEADER, required: false })
  logout(@Req() req: RequestWithContext): { loggedOut: boolean } {
    return { loggedOut: this.authService.logout(extractSessionToken(req)) };
  }

  @Get('me')
  @UseGuards(SessionAuthGuard)
  @ApiOperation({ summary: '현재 세션 조회' })
  @ApiHeader({ name: SESSION_HEADER, required: false })
  me(@Req() req: RequestWithContext): SessionInfoDto {
    return {
      authEnabled: this.authService.isEnabled(),
      username: req.authSession?.username ?? null,
    };
  }
}
