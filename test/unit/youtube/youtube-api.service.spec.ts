import { Test } from '@nestjs/testing';
import { HttpService } from '@nestjs/axios';
import { ConfigService } from '@nestjs/config';
import { AxiosError, AxiosHeaders, AxiosResponse } from 'axios';
import { of, throwError } from 'rxjs';
import {
  CATALOG_MESSAGES,
  YouTubeApiService,
  extractUpstreamMessage,
} from '../../../src/youtube/youtube-api.service';

const axiosResponse = <T>(data: T, status = 200): AxiosResponse<T> => ({
  data,
  status,
  statusText: status === 200 ? 'OK' : 'ERROR',
  headers: {},
  config: { headers: new AxiosHeaders() },
});

const upstreamError = (status: number, data: unknown): AxiosError =>
  new AxiosError(
    `Request failed with status code ${status}`,
    'ERR_BAD_REQUEST',
    undefined,
    undefined,
    axiosResponse(data, status),
  );

describe('YouTubeApiService', () => {
  let service: YouTubeApiService;
  const httpGet = jest.fn();

  const build = async (env: Record<string, string | undefined> = {}) => {
    const moduleRef = await Test.createTestingModule({
      providers: [
        YouTubeApiService,
        { provide: HttpService, useValue: { get: httpGet } },
        { provide: ConfigService, useValue: { get: (key: string) => env[key] } },
      ],
    }).compile();
    service = moduleRef.get(YouTubeApiService);
  };

  beforeEach(async () => {
    httpGet.mockReset();
    await build();
  });

  describe('fetchPopularItems', () => {
    it('API 키가 없으면 요청 없이 MISSING_CREDENTIAL', async () => {
      const result = await service.fetchPopularItems('', 'KR', 30);

      expect(httpGet).not.toHaveBeenCalled();
      expect(result).toEqual({
        ok: false,
        message: CATALOG_MESSAGES.missingCredential,
        cause: { kind: 'MISSING_CREDENTIAL' },
      });
    });

    it('성공 시 items 를 순서대로 반환하고 요청 파라미터를 구성한다', async () => {
      httpGet.mockReturnValue(
        of(axiosResponse({ items: [{ id: 'b' }, { id: 'a' }] })),
      );

      const result = await service.fetchPopularItems('test-key', 'JP', 10);

      expect(result).toEqual({ ok: true, items: [{ id: 'b' }, { id: 'a' }] });
      expect(httpGet).toHaveBeenCalledTimes(1);
      expect(httpGet).toHaveBeenCalledWith(
        'https://www.googleapis.com/youtube/v3/videos',
        {
          params: {
            part: 'snippet,statistics,contentDetails',
            chart: 'mostPopular',
            regionCode: 'JP',
            maxResults: 10,
            key: 'test-key',
          },
          timeout: 10_000,
        },
      );
    });

    it('items 가 없으면 빈 성공 결과', async () => {
      httpGet.mockReturnValue(of(axiosResponse({})));

      await expect(service.fetchPopularItems('test-key', 'KR', 30)).resolves.toEqual({
        ok: true,
        items: [],
      });
    });

    it('HTTP 오류는 상태 코드와 YouTube 메시지로 변환', async () => {
      httpGet.mockReturnValue(
        throwError(() =>
          upstreamError(403, { error: { code: 403, message: 'quotaExceeded' } }),
        ),
      );

      const result = await service.fetchPopularItems('test-key', 'KR', 30);

      expect(result).toEqual({
        ok: false,
        message: 'YouTube API 오류 (status 403): quotaExceeded',
        cause: { kind: 'UPSTREAM_STATUS', code: 403, message: 'quotaExceeded' },
      });
    });

    it('타임아웃은 TIMEOUT', async () => {
      httpGet.mockReturnValue(
        throwError(() => new AxiosError('timeout of 10000ms exceeded', 'ECONNABORTED')),
      );

      const result = await service.fetchPopularItems('test-key', 'KR', 30);

      expect(result).toEqual({
        ok: false,
        message: CATALOG_MESSAGES.timeout,
        cause: { kind: 'TIMEOUT' },
      });
    });

    it('응답 없는 전송 오류는 NETWORK', async () => {
      httpGet.mockReturnValue(
        throwError(() => new AxiosError('getaddrinfo ENOTFOUND', 'ENOTFOUND')),
      );

      const result = await service.fetchPopularItems('test-key', 'KR', 30);

      expect(result).toEqual({
        ok: false,
        message: '네트워크 오류가 발생했습니다: getaddrinfo ENOTFOUND',
        cause: { kind: 'NETWORK', cause: 'getaddrinfo ENOTFOUND' },
      });
    });

    it('그 밖의 예외는 UNEXPECTED', async () => {
      httpGet.mockReturnValue(throwError(() => new Error('boom')));

      const result = await service.fetchPopularItems('test-key', 'KR', 30);

      expect(result).toEqual({
        ok: false,
        message: '알 수 없는 오류가 발생했습니다: boom',
        cause: { kind: 'UNEXPECTED', cause: 'boom' },
      });
    });
  });

  describe('fetchCategories', () => {
    it('id/제목이 있는 항목만 매핑한다', async () => {
      httpGet.mockReturnValue(
        of(
          axiosResponse({
            items: [
              { id: '10', snippet: { title: '음악' } },
              { id: '20', snippet: {} },
              { snippet: { title: '이름만' } },
              { id: '17', snippet: { title: '스포츠' } },
            ],
          }),
        ),
      );

      await expect(service.fetchCategories('test-key', 'KR')).resolves.toEqual({
        '10': '음악',
        '17': '스포츠',
      });
      expect(httpGet).toHaveBeenCalledWith(
        'https://www.googleapis.com/youtube/v3/videoCategories',
        {
          params: { part: 'snippet', regionCode: 'KR', key: 'test-key', hl: 'ko' },
          timeout: 10_000,
        },
      );
    });

    it('어떤 실패든 빈 매핑으로 대체', async () => {
      httpGet.mockReturnValue(throwError(() => upstreamError(500, 'oops')));
      await expect(service.fetchCategories('test-key', 'KR')).resolves.toEqual({});
    });

    it('API 키가 없으면 요청 없이 빈 매핑', async () => {
      await expect(service.fetchCategories('', 'KR')).resolves.toEqual({});
      expect(httpGet).not.toHaveBeenCalled();
    });
  });

  describe('resolveRegion', () => {
    it('빈 값이면 기본 지역 KR', () => {
      expect(service.resolveRegion('')).toBe('KR');
      expect(service.resolveRegion(undefined)).toBe('KR');
      expect(service.resolveRegion(' US ')).toBe('US');
    });

    it('YOUTUBE_REGION 설정 시 기본 지역 변경', async () => {
      await build({ YOUTUBE_REGION: 'JP' });
      expect(service.resolveRegion(null)).toBe('JP');
    });
  });

  describe('extractUpstreamMessage', () => {
    it('JSON 문자열/객체의 error.message 추출', () => {
      expect(extractUpstreamMessage('{"error":{"message":"keyInvalid"}}')).toBe('keyInvalid');
      expect(extractUpstreamMessage({ error: { message: 'forbidden' } })).toBe('forbidden');
    });

    it('구조화된 메시지가 없으면 원문', () => {
      expect(extractUpstreamMessage('Service Unavailable')).toBe('Service Unavailable');
      expect(extractUpstreamMessage('{"foo":1}')).toBe('{"foo":1}');
      expect(extractUpstreamMessage({ foo: 1 })).toBe('{"foo":1}');
      expect(extractUpstreamMessage(null)).toBe('');
    });
  });
});
