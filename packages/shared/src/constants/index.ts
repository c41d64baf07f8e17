/**
 * 상수 모듈 재수출
 */

// 타임아웃 및 타이밍 관련
export * from './timeouts.js';

// 파일 시스템 관련
export * from './files.js';

// Playback modes
export const PlaybackMode = {
  CONTINUOUS: 'continuous',
  SINGLE: 'single',
  LOOP: 'loop',
} as const;

// Coarse media status reported by the host
export const MediaStatus = {
  NONE: 'none',
  PLAYING: 'playing',
  STOPPED: 'stopped',
  ENDED: 'ended',
} as const;

export const DEFAULT_PLAYBACK_MODE = PlaybackMode.CONTINUOUS;

// 재생 관련 상수
export const PlaybackConfig = {
  /** 컨트롤러 틱 간격 (ms) */
  TICK_INTERVAL: 1000,
  /** 재시도 최대 횟수, 초과 시 완전 정지 */
  MAX_RETRY_ATTEMPTS: 3,
  /** 이 값보다 크게 위치가 앞으로 뛰면 탐색(seek)으로 간주 (ms) */
  SEEK_THRESHOLD: 5000,
  /** 재생 시작 후 NONE 상태를 허용하는 유예 시간 (ms) */
  NONE_GRACE_PERIOD: 5000,
  /** 루프 모드 재시작 지연 (ms) */
  LOOP_RESTART_DELAY: 1000,
  /** 진행 상황 로그 간격 (ms) */
  PROGRESS_LOG_INTERVAL: 30000,
} as const;

// 제목 오버레이 관련 상수
export const OverlayTiming = {
  /** 재생 시작 후 제목 표시까지 지연 (ms) */
  SHOW_DELAY: 1500,
  /** 종료 몇 ms 전에 제목을 지울지 */
  CLEAR_LEAD: 3500,
  /** 종료 직전 재스케줄 여유 (CLEAR_LEAD 에 더해짐, ms) */
  CLEAR_LOOKAHEAD: 5000,
  /** 재생 시작 직후 첫 길이 확인 지연 (ms) */
  DURATION_CHECK_DELAY: 200,
  /** 길이를 아직 알 수 없을 때 재확인 간격 (ms) */
  DURATION_POLL_INTERVAL: 500,
  /** 페이드 전체 시간 (ms) */
  FADE_DURATION: 1000,
  /** 페이드 단계 수 */
  FADE_STEPS: 20,
  /** 목표 불투명도 도달 판정 오차 */
  FADE_EPSILON: 0.1,
} as const;

// UI 관련 상수
export const UIConfig = {
  /** 상태 바 높이 */
  STATUS_BAR_HEIGHT: 3,
  /** 최소 터미널 너비 */
  MIN_TERMINAL_WIDTH: 60,
  /** 최소 터미널 높이 */
  MIN_TERMINAL_HEIGHT: 16,
} as const;
