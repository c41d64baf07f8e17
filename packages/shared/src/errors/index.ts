/**
 * 애플리케이션 커스텀 에러 클래스
 *
 * 에러 타입 구분 및 일관된 에러 처리를 위한 에러 클래스
 */

/**
 * 기본 애플리케이션 에러
 */
export class AppError extends Error {
  readonly code: string;
  readonly isOperational: boolean;
  readonly timestamp: Date;
  readonly context?: Record<string, unknown>;

  constructor(
    message: string,
    code = 'APP_ERROR',
    options?: {
      cause?: Error;
      isOperational?: boolean;
      context?: Record<string, unknown>;
    }
  ) {
    super(message, { cause: options?.cause });
    this.name = 'AppError';
    this.code = code;
    this.isOperational = options?.isOperational ?? true;
    this.timestamp = new Date();
    this.context = options?.context;

    // V8 스택 트레이스 유지
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }
  }

  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      message: this.message,
      code: this.code,
      timestamp: this.timestamp.toISOString(),
      context: this.context,
      stack: this.stack,
    };
  }
}

/**
 * 유효성 검사 에러
 */
export class ValidationError extends AppError {
  readonly field?: string;
  readonly value?: unknown;

  constructor(
    message: string,
    options?: {
      cause?: Error;
      field?: string;
      value?: unknown;
      context?: Record<string, unknown>;
    }
  ) {
    super(message, 'VALIDATION_ERROR', {
      cause: options?.cause,
      isOperational: true,
      context: options?.context,
    });
    this.name = 'ValidationError';
    this.field = options?.field;
    this.value = options?.value;
  }
}

/**
 * 설정 에러
 */
export class ConfigurationError extends AppError {
  readonly configKey?: string;
  readonly issues: string[];

  constructor(
    message: string,
    options?: {
      cause?: Error;
      configKey?: string;
      issues?: string[];
      context?: Record<string, unknown>;
    }
  ) {
    super(message, 'CONFIGURATION_ERROR', {
      cause: options?.cause,
      isOperational: false,
      context: options?.context,
    });
    this.name = 'ConfigurationError';
    this.configKey = options?.configKey;
    this.issues = options?.issues ?? [];
  }
}

/**
 * 파일 시스템 에러
 */
export class FileSystemError extends AppError {
  readonly path?: string;
  readonly operation?: string;

  constructor(
    message: string,
    options?: {
      cause?: Error;
      path?: string;
      operation?: string;
      context?: Record<string, unknown>;
    }
  ) {
    super(message, 'FILE_SYSTEM_ERROR', {
      cause: options?.cause,
      isOperational: true,
      context: options?.context,
    });
    this.name = 'FileSystemError';
    this.path = options?.path;
    this.operation = options?.operation;
  }
}

/**
 * 미디어 소스(호스트) 에러
 */
export class MediaSourceError extends AppError {
  readonly localPath?: string;

  constructor(
    message: string,
    options?: {
      cause?: Error;
      localPath?: string;
      context?: Record<string, unknown>;
    }
  ) {
    super(message, 'MEDIA_SOURCE_ERROR', {
      cause: options?.cause,
      isOperational: true,
      context: options?.context,
    });
    this.name = 'MediaSourceError';
    this.localPath = options?.localPath;
  }
}

/**
 * 재생 관련 에러
 */
export class PlaybackError extends AppError {
  readonly itemId?: string;
  readonly mode?: string;

  constructor(
    message: string,
    options?: {
      cause?: Error;
      itemId?: string;
      mode?: string;
      context?: Record<string, unknown>;
    }
  ) {
    super(message, 'PLAYBACK_ERROR', {
      cause: options?.cause,
      isOperational: true,
      context: options?.context,
    });
    this.name = 'PlaybackError';
    this.itemId = options?.itemId;
    this.mode = options?.mode;
  }
}

/**
 * 에러 타입 확인 유틸리티
 */
export function isAppError(error: unknown): error is AppError {
  return error instanceof AppError;
}

export function isConfigurationError(error: unknown): error is ConfigurationError {
  return error instanceof ConfigurationError;
}

/**
 * 에러를 AppError로 래핑
 */
export function wrapError(
  error: unknown,
  message?: string,
  code?: string
): AppError {
  if (error instanceof AppError) {
    return error;
  }

  const originalError = error instanceof Error ? error : new Error(String(error));

  return new AppError(message ?? originalError.message, code ?? 'UNKNOWN_ERROR', {
    cause: originalError,
    isOperational: false,
  });
}
