import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';

interface CapturedOptions {
  level?: string;
  base?: Record<string, string>;
  formatters?: { level?: (label: string) => Record<string, string> };
  transport?: { target?: string; options?: Record<string, unknown> };
}

// Capture the options passed to pino
let capturedOptions: CapturedOptions | undefined;
const destinations: unknown[] = [];
const childLogger = { info: vi.fn() };
const mockChild = vi.fn(() => childLogger);

vi.mock('pino', () => {
  const mockPino = Object.assign(
    vi.fn((opts: CapturedOptions) => {
      capturedOptions = opts;
      return { level: opts?.level ?? 'info', child: mockChild };
    }),
    {
      destination: vi.fn((fd: unknown) => {
        destinations.push(fd);
        return 'mock-destination';
      }),
    }
  );
  return { default: mockPino };
});

describe('logger', () => {
  beforeEach(() => {
    vi.resetModules();
    capturedOptions = undefined;
    destinations.length = 0;
  });

  afterEach(() => {
    vi.unstubAllEnvs();
  });

  describe('getLogLevel (via pino config)', () => {
    it('defaults to info when LOG_LEVEL is not set', async () => {
      vi.stubEnv('LOG_LEVEL', '');
      await import('../logger.js');
      expect(capturedOptions?.level).toBe('info');
    });

    it('returns valid level when LOG_LEVEL=debug', async () => {
      vi.stubEnv('LOG_LEVEL', 'debug');
      await import('../logger.js');
      expect(capturedOptions?.level).toBe('debug');
    });

    it('ignores invalid level (LOG_LEVEL=banana falls back to info)', async () => {
      vi.stubEnv('LOG_LEVEL', 'banana');
      await import('../logger.js');
      expect(capturedOptions?.level).toBe('info');
    });

    it('is case-insensitive (LOG_LEVEL=DEBUG returns debug)', async () => {
      vi.stubEnv('LOG_LEVEL', 'DEBUG');
      await import('../logger.js');
      expect(capturedOptions?.level).toBe('debug');
    });

    it('accepts all pino log levels, silent included', async () => {
      for (const level of ['trace', 'debug', 'info', 'warn', 'error', 'fatal', 'silent']) {
        vi.resetModules();
        capturedOptions = undefined;
        vi.stubEnv('LOG_LEVEL', level);
        await import('../logger.js');
        expect(capturedOptions?.level).toBe(level);
      }
    });
  });

  describe('output destination', () => {
    it('writes JSON logs to stderr outside development', async () => {
      vi.stubEnv('NODE_ENV', 'production');
      await import('../logger.js');
      expect(capturedOptions?.transport).toBeUndefined();
      expect(destinations).toEqual([2]);
    });

    it('pretty-prints to stderr in development', async () => {
      vi.stubEnv('NODE_ENV', 'development');
      await import('../logger.js');
      expect(capturedOptions?.transport?.target).toBe('pino-pretty');
      expect(capturedOptions?.transport?.options?.destination).toBe(2);
    });
  });

  describe('logger instance', () => {
    it('tags every line with the service name', async () => {
      await import('../logger.js');
      expect(capturedOptions?.base).toEqual({ service: 'logo-crawler' });
    });

    it('configures level formatter to return label', async () => {
      await import('../logger.js');
      expect(capturedOptions?.formatters?.level?.('info')).toEqual({ level: 'info' });
    });

    it('exports logger as a named export', async () => {
      const mod = await import('../logger.js');
      expect(mod.logger).toBeDefined();
    });

    it('binds the domain on a child logger', async () => {
      const { domainLogger } = await import('../logger.js');
      expect(domainLogger('example.com')).toBe(childLogger);
      expect(mockChild).toHaveBeenCalledWith({ domain: 'example.com' });
    });
  });
});
