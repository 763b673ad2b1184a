import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import path from 'path';
import os from 'os';

// Mock the synchronous fs module so tests don't touch the real filesystem
vi.mock('fs');

const LOG_DIR = path.join(os.homedir(), '.switchboard', 'logs');
const LOG_FILE = path.join(LOG_DIR, 'switchboard.log');

function enoent(): never {
  throw Object.assign(new Error('ENOENT'), { code: 'ENOENT' });
}

describe('logger module', () => {
  let fs: typeof import('fs');
  let loggerModule: typeof import('../logger.js');

  beforeEach(async () => {
    // Reset module state between tests so the logger singleton is fresh
    vi.resetModules();
    vi.clearAllMocks();

    fs = await import('fs');
    loggerModule = await import('../logger.js');
  });

  afterEach(() => {
    vi.clearAllMocks();
    vi.unstubAllEnvs();
  });

  describe('default logger', () => {
    it('works without initLogger() being called', () => {
      const { logger } = loggerModule;
      expect(logger.level).toBe(3);
      expect(() => logger.info('test message')).not.toThrow();
    });
  });

  describe('initLogger', () => {
    beforeEach(() => {
      vi.mocked(fs.statSync).mockImplementation(enoent);
    });

    it('creates the default log directory', () => {
      loggerModule.initLogger();

      expect(vi.mocked(fs.mkdirSync)).toHaveBeenCalledWith(LOG_DIR, { recursive: true });
    });

    it('uses a custom log directory', () => {
      loggerModule.initLogger({ logDir: '/tmp/sb-logs', level: 3 });
      loggerModule.logger.info('custom dir');

      expect(vi.mocked(fs.mkdirSync)).toHaveBeenCalledWith('/tmp/sb-logs', { recursive: true });
      expect(vi.mocked(fs.appendFileSync).mock.calls[0]?.[0]).toBe(
        path.join('/tmp/sb-logs', 'switchboard.log'),
      );
    });

    it('sets log level from options', () => {
      loggerModule.initLogger({ level: 5 });

      expect(loggerModule.logger.level).toBe(5);
    });

    it('defaults to level 4 (debug) outside production', () => {
      vi.stubEnv('NODE_ENV', 'development');

      loggerModule.initLogger();

      expect(loggerModule.logger.level).toBe(4);
    });

    it('defaults to level 3 (info) in production', () => {
      vi.stubEnv('NODE_ENV', 'production');

      loggerModule.initLogger();

      expect(loggerModule.logger.level).toBe(3);
    });
  });

  describe('file reporter', () => {
    beforeEach(() => {
      vi.mocked(fs.statSync).mockImplementation(enoent);
    });

    it('writes NDJSON lines to the log file', () => {
      loggerModule.initLogger({ level: 5 });

      loggerModule.logger.info('[Gateway] hello', 'world');

      const calls = vi.mocked(fs.appendFileSync).mock.calls;
      expect(calls).toHaveLength(1);

      const [filePath, content] = calls[0] as [string, string];
      expect(filePath).toBe(LOG_FILE);
      expect(content.endsWith('\n')).toBe(true);

      const parsed = JSON.parse(content.trim());
      expect(parsed.level).toBe('info');
      expect(parsed.msg).toBe('[Gateway] hello world');
      expect(new Date(parsed.time).toISOString()).toBe(parsed.time);
    });

    it('skips entries below the configured level', () => {
      loggerModule.initLogger({ level: 3 });

      loggerModule.logger.debug('too chatty');

      expect(vi.mocked(fs.appendFileSync)).not.toHaveBeenCalled();
    });
  });

  describe('log rotation', () => {
    it('rotates the log file when it exceeds 10MB', () => {
      vi.mocked(fs.statSync).mockReturnValue({ size: 10 * 1024 * 1024 + 1 } as ReturnType<typeof fs.statSync>);
      vi.mocked(fs.readdirSync).mockReturnValue([] as unknown as ReturnType<typeof fs.readdirSync>);

      loggerModule.initLogger();

      expect(vi.mocked(fs.renameSync)).toHaveBeenCalledWith(
        LOG_FILE,
        expect.stringMatching(/switchboard-\d{4}-\d{2}-\d{2}-\d+\.log$/),
      );
    });

    it('does not rotate when the file is under 10MB', () => {
      vi.mocked(fs.statSync).mockReturnValue({ size: 10 * 1024 * 1024 - 1 } as ReturnType<typeof fs.statSync>);

      loggerModule.initLogger();

      expect(vi.mocked(fs.renameSync)).not.toHaveBeenCalled();
    });

    it('deletes rotated files beyond the newest 7', () => {
      vi.mocked(fs.statSync).mockReturnValue({ size: 10 * 1024 * 1024 + 1 } as ReturnType<typeof fs.statSync>);
      const rotated = Array.from({ length: 9 }, (_, i) => `switchboard-2026-01-0${i + 1}-00${i + 1}.log`);
      vi.mocked(fs.readdirSync).mockReturnValue(rotated as unknown as ReturnType<typeof fs.readdirSync>);

      loggerModule.initLogger();

      expect(vi.mocked(fs.unlinkSync).mock.calls).toEqual([
        [path.join(LOG_DIR, 'switchboard-2026-01-02-002.log')],
        [path.join(LOG_DIR, 'switchboard-2026-01-01-001.log')],
      ]);
    });

    it('keeps going when rotation fails', () => {
      const warnSpy = vi.spyOn(console, 'warn').mockImplementation(() => undefined);
      vi.mocked(fs.statSync).mockReturnValue({ size: 10 * 1024 * 1024 + 1 } as ReturnType<typeof fs.statSync>);
      vi.mocked(fs.renameSync).mockImplementation(() => {
        throw new Error('EACCES');
      });

      expect(() => loggerModule.initLogger()).not.toThrow();
      expect(warnSpy).toHaveBeenCalledWith('[Logger] Log rotation failed:', 'EACCES');
      warnSpy.mockRestore();
    });
  });
});
