import { describe, it, expect } from 'vitest';
import { ConsoleProvider } from '../../src/providers/ConsoleProvider.js';
import { createLogEvent, stubConsole } from '../_helpers.js';

describe('ConsoleProvider', () => {
  it('should emit structured JSON when environment is production', () => {
    // Arrange
    const stub = stubConsole();

    try {
      const provider = new ConsoleProvider({ redactKeys: ['context'] });
      provider.setup({ environment: 'production' });
      const event = createLogEvent({ context: { secret: 'value' } });

      // Act
      provider.log(event);

      // Assert
      expect(stub.calls.log).toHaveLength(1);
      const payload: unknown = JSON.parse(String(stub.calls.log[0][0]));
      expect(payload).toEqual({
        level: 'info',
        message: 'test-message',
        timestamp: '2024-01-01T00:00:00.000Z',
        tags: { feature: 'alpha' },
        context: '[REDACTED]',
        runtime: { environment: 'test' },
      });
    } finally {
      stub.restore();
    }
  });

  it('should print a plain pipe-joined line when colours are disabled', () => {
    // Arrange
    const stub = stubConsole();

    try {
      const provider = new ConsoleProvider({ enableColors: false });
      provider.setup({ environment: 'development' });

      // Act
      provider.log(createLogEvent());

      // Assert
      expect(stub.calls.log[0][0]).toBe(
        '[INFO] | test-message | tags={"feature":"alpha"} | ctx={"path":"/health"}',
      );
    } finally {
      stub.restore();
    }
  });

  it('should route warnings and errors to their console methods', () => {
    // Arrange
    const stub = stubConsole();

    try {
      const provider = new ConsoleProvider({ enableColors: false });
      const error = new Error('kaboom');
      error.stack = 'Error: kaboom\n    at handler';

      // Act
      provider.log(createLogEvent({ level: 'warn', tags: {}, context: {} }));
      provider.log(createLogEvent({ level: 'error', tags: {}, context: {}, error }));

      // Assert
      expect(stub.calls.warn[0][0]).toBe('[WARN] | test-message');
      expect(stub.calls.error[0][0]).toBe(
        '[ERROR] | test-message | error=Error: kaboom\n    at handler',
      );
      expect(stub.calls.log).toHaveLength(0);
    } finally {
      stub.restore();
    }
  });

  it('should colour the level label by default', () => {
    // Arrange
    const stub = stubConsole();

    try {
      const provider = new ConsoleProvider();

      // Act
      provider.log(createLogEvent({ tags: {}, context: {} }));

      // Assert
      expect(stub.calls.log[0][0]).toBe('\u001B[32m[INFO]\u001B[0m | test-message');
    } finally {
      stub.restore();
    }
  });

  it('should log the received event first when debug is enabled', () => {
    // Arrange
    const stub = stubConsole();

    try {
      const provider = new ConsoleProvider({ debug: true, enableColors: false });

      // Act
      provider.log(createLogEvent());

      // Assert
      expect(stub.calls.log).toHaveLength(2);
      expect(stub.calls.log[0][0]).toBe('[console] Debug - Log event received:');
    } finally {
      stub.restore();
    }
  });
});
