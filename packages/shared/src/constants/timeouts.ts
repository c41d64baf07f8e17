/**
 * 타임아웃 관련 상수
 */

/** 애플리케이션 종료 타임아웃 (ms) */
export const SHUTDOWN_TIMEOUT = 5000;

/** 플레이어 프로세스 종료 대기 (ms) */
export const PROCESS_KILL_TIMEOUT = 2000;

/** 미디어 길이 조회(ffprobe) 타임아웃 (ms) */
export const DURATION_PROBE_TIMEOUT = 10000;

/** 캐시 재검사 기본 간격 (ms) */
export const CACHE_RESCAN_INTERVAL = 60000;

/** 상태 바 메시지 표시 시간 (ms) */
export const STATUS_MESSAGE_DURATION = 3000;

/** 에러 메시지 표시 시간 (ms) */
export const ERROR_DISPLAY_DURATION = 5000;
