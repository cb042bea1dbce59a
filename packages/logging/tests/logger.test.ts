import { describe, it, expect } from 'vitest';
import { createLogger, loggerOptions, resolveLogLevel } from '../src/index.js';

function memoryStream() {
  const lines: string[] = [];
  return {
    lines,
    write(chunk: string) {
      lines.push(chunk);
    },
  };
}

describe('resolveLogLevel', () => {
  it('defaults to info', () => {
    expect(resolveLogLevel({})).toBe('info');
  });

  it('reads LOG_LEVEL', () => {
    expect(resolveLogLevel({ LOG_LEVEL: 'debug' })).toBe('debug');
  });
});

describe('createLogger', () => {
  it('names the logger after the component', () => {
    expect(loggerOptions('net', 'info').name).toBe('hostkit:net');
  });

  it('writes level labels and redacts credentials', () => {
    const stream = memoryStream();
    const logger = createLogger('test', stream);
    logger.level = 'info';

    logger.info({ headers: { authorization: 'Basic dGVzdDp0ZXN0' }, user: 'alice' }, 'hello');

    expect(stream.lines).toHaveLength(1);
    const entry = JSON.parse(stream.lines[0]);
    expect(entry.level).toBe('info');
    expect(entry.msg).toBe('hello');
    expect(entry.service).toBe('hostkit');
    expect(entry.user).toBe('alice');
    expect(entry.headers.authorization).toBe('[REDACTED]');
    expect(typeof entry.timestamp).toBe('string');
  });
});
