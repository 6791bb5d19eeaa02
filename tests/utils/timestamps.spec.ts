import { describe, it, expect } from 'vitest';
import { compactUtcStamp, formatLogTimestamp } from '../../src/utils/timestamps.js';

describe('formatLogTimestamp', () => {
  it('should format as day/month/year with a 24-hour clock', () => {
    // Arrange
    const date = new Date('2024-01-15T10:30:00.000Z');

    // Act & Assert
    expect(formatLogTimestamp(date, 'UTC')).toBe('15/01/2024 10:30:00');
  });

  it('should shift the wall-clock time into the requested zone', () => {
    // Arrange
    const date = new Date('2024-07-01T23:05:09.000Z');

    // Act & Assert
    expect(formatLogTimestamp(date, 'Europe/London')).toBe('02/07/2024 00:05:09');
  });

  it('should print midnight as 00 rather than 24', () => {
    expect(formatLogTimestamp(new Date('2024-02-29T00:00:00.000Z'), 'UTC')).toBe(
      '29/02/2024 00:00:00',
    );
  });
});

describe('compactUtcStamp', () => {
  it('should pad every field', () => {
    expect(compactUtcStamp(new Date('2024-03-05T04:07:09.000Z'))).toBe('20240305_040709');
  });
});
