import { PlaybackMode, clampPercent, formatDuration } from '@loopcast/shared';
import type { PlaybackModeType } from '@loopcast/shared';

export function formatProgress(positionMs: number, durationMs: number): string {
  if (!durationMs) return '[----------] 0%';

  const percent = Math.min(100, Math.round((positionMs / durationMs) * 100));
  const filled = Math.round(percent / 10);
  const empty = 10 - filled;

  return `[${'█'.repeat(filled)}${'░'.repeat(empty)}] ${percent}% ${formatDuration(positionMs)} / ${formatDuration(durationMs)}`;
}

export function truncate(str: string | undefined | null, maxLength: number): string {
  if (!str) return '';
  if (str.length <= maxLength) return str;
  return str.slice(0, maxLength - 3) + '...';
}

// Blessed uses {tag} syntax for colors/styles, so curly braces must be escaped
export function escapeBlessedMarkup(str: string | undefined | null): string {
  if (!str) return '';
  return str.replace(/\{/g, '{{').replace(/\}/g, '}}');
}

/**
 * Terminal text has no alpha channel; opacity becomes a grey level
 * between the black background (0) and white (100).
 */
export function opacityToColor(percent: number): string {
  const level = Math.round((clampPercent(percent) * 255) / 100);
  const hex = level.toString(16).padStart(2, '0');
  return `#${hex}${hex}${hex}`;
}

const MODE_LABELS: Record<PlaybackModeType, string> = {
  [PlaybackMode.CONTINUOUS]: 'Continuous',
  [PlaybackMode.SINGLE]: 'Single',
  [PlaybackMode.LOOP]: 'Loop',
};

export function formatModeLabel(mode: PlaybackModeType): string {
  return MODE_LABELS[mode];
}
