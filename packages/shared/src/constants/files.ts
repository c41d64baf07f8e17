/**
 * 파일 시스템 관련 상수
 */

/** 정규화가 끝난 캐시 파일 접미사 */
export const NORMALIZED_SUFFIX = '_normalized.mp4';

/** 다운로드 중 남는 임시 파일 패턴 */
export const PARTIAL_DOWNLOAD_EXTENSION = '.part';
export const TEMP_MEDIA_SUFFIX = '_temp.mp4';

/** 영상 ID 형식 (11자) */
export const VIDEO_ID_PATTERN = /^[A-Za-z0-9_-]{11}$/;

/** 재생 기록 파일 이름 */
export const PLAY_HISTORY_FILENAME = 'play_history.json';

/** 기본 캐시 디렉토리 이름 */
export const CACHE_DIR_NAME = 'cache';

/** 메타데이터를 알 수 없을 때 표시할 값 */
export const UNKNOWN_TITLE = 'Unknown Song';
export const UNKNOWN_ARTIST = 'Unknown Artist';

/** 메타데이터 추출 실패 표시 */
export const DEGRADED_MARKER = ' ⚠';
