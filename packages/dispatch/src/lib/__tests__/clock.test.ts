import { describe, it, expect } from 'vitest';
import { fixedClock, formatDisplayTime, formatFileStamp } from '../clock.js';

describe('clock helpers', () => {
  const at = new Date('2024-03-05T07:08:09.123Z');

  it('fixedClock returns the same instant on every call', () => {
    const clock = fixedClock(at);
    expect(clock.now().getTime()).toBe(at.getTime());
    expect(clock.now()).not.toBe(clock.now());
  });

  it('formats display timestamps in UTC', () => {
    expect(formatDisplayTime(at)).toBe('2024-03-05 07:08:09');
  });

  it('formats file stamps in UTC', () => {
    expect(formatFileStamp(at)).toBe('20240305_070809');
  });
});
