export enum ErrorCodes {
  // YouTube 조회 관련 에러
  MISSING_CREDENTIAL = 'MISSING_CREDENTIAL',
  YOUTUBE_API_ERROR = 'YOUTUBE_API_ERROR',
  TIMEOUT_ERROR = 'TIMEOUT_ERROR',
  NETWORK_ERROR = 'NETWORK_ERROR',

  // 인증 관련 에러
  UNAUTHORIZED = 'UNAUTHORIZED',
  INVALID_CREDENTIALS = 'INVALID_CREDENTIALS',

  // 일반 에러
  VALIDATION_ERROR = 'VALIDATION_ERROR',
  DATA_NOT_FOUND = 'DATA_NOT_FOUND',
  INTERNAL_SERVER_ERROR = 'INTERNAL_SERVER_ERROR',
}
