import { describe, it, expect } from 'vitest';
import {
  escapeHtml,
  sanitizeRecord,
  sanitizeText,
  stripTags,
} from '../../src/ingest/sanitize.js';
import type { ErrorRecord } from '../../src/ingest/types.js';

describe('sanitizeText', () => {
  it('should remove markup and keep the text between tags', () => {
    expect(sanitizeText('<script>alert(1)</script> hello')).toBe('alert(1) hello');
  });

  it('should escape special characters that are not markup', () => {
    expect(sanitizeText(`a < b & "c" it's`)).toBe('a &lt; b &amp; &quot;c&quot; it&#039;s');
  });

  it('should drop an unterminated tag to the end of the value', () => {
    expect(sanitizeText('hello <img src=x onerror=alert(1)')).toBe('hello ');
  });

  it('should collapse line breaks so a value stays on one line', () => {
    expect(sanitizeText('first\r\n\nsecond\rthird')).toBe('first second third');
  });

  it('should leave a stray closing bracket escaped', () => {
    expect(sanitizeText('1 > 0')).toBe('1 &gt; 0');
  });
});

describe('stripTags', () => {
  it('should remove comments, closing tags and processing instructions', () => {
    expect(stripTags('<!-- note -->a</b><?xml version="1.0"?>b')).toBe('ab');
  });
});

describe('escapeHtml', () => {
  it('should escape ampersands first so entities are not double-read', () => {
    expect(escapeHtml('&lt;')).toBe('&amp;lt;');
  });
});

describe('sanitizeRecord', () => {
  it('should sanitize every text field and each stack line', () => {
    // Arrange
    const record: ErrorRecord = {
      timestamp: '15/01/2024 10:30:00',
      message: '<b>bold</b> failure',
      source: '<i>player.js</i>',
      context: 'General',
      userAgent: 'Agent "quoted"',
      pageUrl: 'http://player.test/?a=1&b=2',
      endpointDns: 'Unknown',
      corsEnabled: true,
      stackTrace: ['at <anonymous>', 'at run (x.js:1:1)'],
    };

    // Act
    const clean = sanitizeRecord(record);

    // Assert
    expect(clean).toEqual({
      timestamp: '15/01/2024 10:30:00',
      message: 'bold failure',
      source: 'player.js',
      context: 'General',
      userAgent: 'Agent &quot;quoted&quot;',
      pageUrl: 'http://player.test/?a=1&amp;b=2',
      endpointDns: 'Unknown',
      corsEnabled: true,
      stackTrace: ['at ', 'at run (x.js:1:1)'],
    });
    expect(record.message).toBe('<b>bold</b> failure');
  });
});
