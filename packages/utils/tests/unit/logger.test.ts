/**
 * Logger Tests
 * ============
 * Namespaces, child context, error serialization and LOG_* settings
 */

import { describe, it, expect, vi } from 'vitest';
import { CatalogError } from '../../src/errors.js';
import { createLogger, logger, resolveLoggerConfig, winstonLogger } from '../../src/logger.js';

describe('Logger', () => {
  it('should attach the namespace and child context to every line', () => {
    const spy = vi.spyOn(winstonLogger, 'info').mockImplementation(() => winstonLogger);
    const log = createLogger('@stellar-grid/workflows').child({ jobId: 1 });

    log.info('Materialized run', { runName: 'm1_10' });

    expect(spy).toHaveBeenCalledWith('Materialized run', {
      namespace: '@stellar-grid/workflows',
      jobId: 1,
      runName: 'm1_10',
    });
  });

  it('should flatten Error instances', () => {
    const spy = vi.spyOn(winstonLogger, 'error').mockImplementation(() => winstonLogger);
    const error = new Error('disk full');

    logger.error('Catalog insert failed', error, { runName: 'm1_20' });

    expect(spy).toHaveBeenCalledWith('Catalog insert failed', {
      namespace: 'stellar-grid',
      runName: 'm1_20',
      error: { name: 'Error', message: 'disk full', stack: error.stack },
    });
  });

  it('should keep the code and context of application errors', () => {
    const spy = vi.spyOn(winstonLogger, 'error').mockImplementation(() => winstonLogger);
    const error = new CatalogError('locked', 'insert');

    logger.error('CLI error', error);

    expect(spy).toHaveBeenCalledWith('CLI error', {
      namespace: 'stellar-grid',
      error: {
        name: 'CatalogError',
        message: 'locked',
        code: 'CATALOG_ERROR',
        context: { operation: 'insert' },
        stack: error.stack,
      },
    });
  });

  it('should log without an error', () => {
    const spy = vi.spyOn(winstonLogger, 'error').mockImplementation(() => winstonLogger);

    createLogger('core').error('Grid rejected', undefined, { axes: 0 });

    expect(spy).toHaveBeenCalledWith('Grid rejected', { namespace: 'core', axes: 0 });
  });

  it('should not change the parent when creating a child', () => {
    const spy = vi.spyOn(winstonLogger, 'warn').mockImplementation(() => winstonLogger);
    const parent = createLogger('cli').child({ command: 'grid.build' });

    parent.child({ jobId: 0 }).warn('Job has one run');
    parent.warn('Overwriting runs');

    expect(spy).toHaveBeenNthCalledWith(1, 'Job has one run', {
      namespace: 'cli',
      command: 'grid.build',
      jobId: 0,
    });
    expect(spy).toHaveBeenNthCalledWith(2, 'Overwriting runs', { namespace: 'cli', command: 'grid.build' });
  });

  describe('resolveLoggerConfig', () => {
    it('should disable files under test and honor overrides', () => {
      const config = resolveLoggerConfig({
        NODE_ENV: 'test',
        LOG_LEVEL: 'warn',
        LOG_CONSOLE: 'false',
        LOG_DIR: '/tmp/grid-logs',
      });

      expect(config).toEqual({
        level: 'warn',
        enableConsole: false,
        enableFile: false,
        logDir: '/tmp/grid-logs',
        maxFiles: '14d',
        maxSize: '20m',
      });
    });

    it('should default to info in production', () => {
      const config = resolveLoggerConfig({ NODE_ENV: 'production' });

      expect(config.level).toBe('info');
      expect(config.enableFile).toBe(true);
    });
  });
});
