import { DEGRADED_MARKER, UNKNOWN_ARTIST, UNKNOWN_TITLE } from '../constants/files.js';
import type { LibraryItem, TitleInfo } from '../types/models.js';

/**
 * 오버레이에 표시할 제목 문자열
 * "Title - Artist", 한쪽만 있으면 그 값만, 둘 다 없으면 빈 문자열
 */
export function formatTitleText(info: TitleInfo): string {
  const title = info.title.trim();
  const artist = info.artist.trim();

  let text: string;
  if (title && artist) {
    text = `${title} - ${artist}`;
  } else {
    text = title || artist;
  }

  if (text && info.degraded) {
    text += DEGRADED_MARKER;
  }
  return text;
}

export function toTitleInfo(item: LibraryItem | undefined | null): TitleInfo {
  if (!item) {
    return { title: UNKNOWN_TITLE, artist: UNKNOWN_ARTIST, degraded: false };
  }
  return {
    title: item.title || UNKNOWN_TITLE,
    artist: item.artist || UNKNOWN_ARTIST,
    degraded: item.metadataDegraded,
  };
}

/**
 * 밀리초를 m:ss (1시간 이상이면 h:mm:ss) 로 변환
 */
export function formatDuration(ms: number): string {
  if (!Number.isFinite(ms) || ms <= 0) {
    return '0:00';
  }
  const totalSeconds = Math.floor(ms / 1000);
  const hours = Math.floor(totalSeconds / 3600);
  const minutes = Math.floor((totalSeconds % 3600) / 60);
  const seconds = totalSeconds % 60;
  const ss = String(seconds).padStart(2, '0');
  if (hours > 0) {
    return `${hours}:${String(minutes).padStart(2, '0')}:${ss}`;
  }
  return `${minutes}:${ss}`;
}

/**
 * 불투명도를 0..100 정수로 고정
 */
export function clampPercent(value: number): number {
  if (!Number.isFinite(value)) return 0;
  return Math.min(100, Math.max(0, Math.round(value)));
}
