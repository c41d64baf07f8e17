/**
 * 타입 가드 함수 모음
 *
 * 런타임에서 안전한 타입 체크를 위한 유틸리티
 */

/**
 * Node.js 시스템 에러 타입 가드 (ENOENT, EACCES 등)
 */
export interface NodeSystemError extends Error {
  code: string;
  errno?: number;
  syscall?: string;
  path?: string;
}

export function isNodeSystemError(error: unknown): error is NodeSystemError {
  return error instanceof Error && 'code' in error && typeof error.code === 'string';
}

/**
 * 특정 에러 코드를 가진 Node.js 에러 확인
 */
export function isNodeErrorWithCode(error: unknown, code: string): boolean {
  return isNodeSystemError(error) && error.code === code;
}

/**
 * 파일 없음 에러 (ENOENT)
 */
export function isFileNotFoundError(error: unknown): boolean {
  return isNodeErrorWithCode(error, 'ENOENT');
}

// ============================================
// 일반 에러 유틸리티
// ============================================

export function isError(value: unknown): value is Error {
  return value instanceof Error;
}

/**
 * 알 수 없는 값에서 에러 메시지 추출
 */
export function getErrorMessage(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  if (typeof error === 'string') {
    return error;
  }
  if (error && typeof error === 'object' && 'message' in error) {
    return String(error.message);
  }
  return 'Unknown error';
}

// ============================================
// 기본 타입 가드
// ============================================

export function isString(value: unknown): value is string {
  return typeof value === 'string';
}

export function isNonEmptyString(value: unknown): value is string {
  return typeof value === 'string' && value.trim().length > 0;
}

export function isPositiveInteger(value: unknown): value is number {
  return typeof value === 'number' && Number.isInteger(value) && value > 0;
}

export function isStringArray(value: unknown): value is string[] {
  return Array.isArray(value) && value.every(isString);
}
