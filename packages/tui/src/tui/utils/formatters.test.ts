import { describe, it, expect } from 'vitest';
import { PlaybackMode } from '@loopcast/shared';
import { escapeBlessedMarkup, formatModeLabel, formatProgress, opacityToColor, truncate } from './formatters.js';

describe('formatters', () => {
  it('maps opacity to a grey level', () => {
    expect(opacityToColor(0)).toBe('#000000');
    expect(opacityToColor(50)).toBe('#808080');
    expect(opacityToColor(100)).toBe('#ffffff');
    expect(opacityToColor(140)).toBe('#ffffff');
    expect(opacityToColor(-5)).toBe('#000000');
  });

  it('escapes blessed tags', () => {
    expect(escapeBlessedMarkup('{bold}x{/bold}')).toBe('{{bold}}x{{/bold}}');
    expect(escapeBlessedMarkup(null)).toBe('');
  });

  it('truncates long text', () => {
    expect(truncate('abcdefghij', 8)).toBe('abcde...');
    expect(truncate('abc', 8)).toBe('abc');
    expect(truncate(undefined, 8)).toBe('');
  });

  it('renders progress', () => {
    expect(formatProgress(0, 0)).toBe('[----------] 0%');
    expect(formatProgress(90000, 180000)).toBe('[█████░░░░░] 50% 1:30 / 3:00');
    expect(formatProgress(200000, 180000)).toBe('[██████████] 100% 3:20 / 3:00');
  });

  it('labels modes', () => {
    expect(formatModeLabel(PlaybackMode.LOOP)).toBe('Loop');
    expect(formatModeLabel(PlaybackMode.CONTINUOUS)).toBe('Continuous');
  });
});
