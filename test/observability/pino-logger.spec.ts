import { Hono } from 'hono';
import { beforeEach, describe, expect, it, vi } from 'vitest';
import {
  createContextAwarePinoLogger,
  createPinoHttpMiddleware,
  createPinoOptions,
  type PinoLogger,
} from '../../src/observability/pino-logger.js';
import {
  createRequestContextMiddleware,
  type RequestContext,
  requestContextStorage,
} from '../../src/observability/request-context.js';

function createMockPino(): PinoLogger {
  const mockPino: PinoLogger = {
    level: 'info',
    debug: vi.fn(),
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
    child: vi.fn(() => createMockPino()),
  };
  return mockPino;
}

const context: RequestContext = {
  requestId: 'req-123',
  method: 'GET',
  path: '/history/incident',
  custom: { queryType: 'historic-incident' },
};

describe('Pino Logger', () => {
  describe('createPinoOptions', () => {
    it('should set the level and drop pid/hostname', () => {
      const options = createPinoOptions('debug');

      expect(options.level).toBe('debug');
      expect(options.base).toBeUndefined();
      expect(options.formatters?.level?.('warn', 40)).toEqual({ level: 'warn' });
    });
  });

  describe('createContextAwarePinoLogger', () => {
    let mockPino: PinoLogger;

    beforeEach(() => {
      mockPino = createMockPino();
    });

    it('should add request id, custom context, service and meta', async () => {
      const logger = createContextAwarePinoLogger({ pino: mockPino, service: 'query-binder' });

      await requestContextStorage.run(context, async () => {
        logger.info('Query executed', { results: 3 });
      });

      expect(mockPino.info).toHaveBeenCalledWith(
        {
          requestId: 'req-123',
          queryType: 'historic-incident',
          service: 'query-binder',
          results: 3,
        },
        'Query executed'
      );
    });

    it('should work without request context', () => {
      const logger = createContextAwarePinoLogger({ pino: mockPino });

      logger.warn('Outside request', 'not an object', ['ignored']);

      expect(mockPino.warn).toHaveBeenCalledWith({}, 'Outside request');
    });

    it('should route every level to pino', () => {
      const logger = createContextAwarePinoLogger({ pino: mockPino });

      logger.debug('d');
      logger.error('e');

      expect(mockPino.debug).toHaveBeenCalledWith({}, 'd');
      expect(mockPino.error).toHaveBeenCalledWith({}, 'e');
    });

    it('should create child loggers through pino', () => {
      const logger = createContextAwarePinoLogger({ pino: mockPino, service: 'query-binder' });

      const child = logger.child?.({ component: 'routes' });
      child?.info('From child');

      expect(mockPino.child).toHaveBeenCalledWith({ component: 'routes' });
      expect(mockPino.info).not.toHaveBeenCalled();
    });
  });

  describe('createPinoHttpMiddleware', () => {
    let mockPino: PinoLogger;
    let app: Hono;

    beforeEach(() => {
      mockPino = createMockPino();
      app = new Hono();
      app.use(createRequestContextMiddleware());
      app.use(createPinoHttpMiddleware(mockPino));
      app.get('/ok', (c) => c.json([]));
      app.get('/bad', (c) => c.json({ type: 'InvalidSortException' }, 400));
      app.get('/down', () => new Response('Error', { status: 500 }));
    });

    it('should log successful requests at info', async () => {
      await app.request('/ok');

      expect(mockPino.info).toHaveBeenCalledWith(
        {
          requestId: expect.any(String),
          method: 'GET',
          path: '/ok',
          status: 200,
          duration: expect.any(Number),
        },
        'HTTP Request'
      );
    });

    it('should log 4xx at warn', async () => {
      await app.request('/bad');

      expect(mockPino.warn).toHaveBeenCalledWith(
        expect.objectContaining({ status: 400 }),
        'HTTP Request'
      );
      expect(mockPino.info).not.toHaveBeenCalled();
    });

    it('should log 5xx at error', async () => {
      await app.request('/down');

      expect(mockPino.error).toHaveBeenCalledWith(
        expect.objectContaining({ status: 500 }),
        'HTTP Request'
      );
    });
  });
});
