import { IsNotEmpty, IsString, MaxLength } from 'class-validator';
import { ApiProperty } from '@nestjs/swagger';

export class LoginDto {
  @ApiProperty({ description: '아이디', example: 'demo' })
  @IsString()
  @IsNotEmpty()
  @MaxLength(64)
  username!: string;

  @ApiProperty({ description: '비밀번호', example: 'test-password' })
  @IsString()
  @IsNotEmpty()
  @MaxLength(128)
  password!: string;
}

export interface LoginResponseDto {
  token: string;
  username: string;
  createdAt: string;
}

export interface SessionInfoDto {
  authEnabled: boolean;
  username: string | null;
}
