/**
 * Unit tests for Error Handler and die()
 */

import { describe, it, expect, beforeEach, vi, type MockInstance } from 'vitest';
import { CatalogError, ValidationError, logger } from '@stellar-grid/utils';
import { exitCodeFor, formatError, handleError } from '../../../src/core/error-handler.js';
import { die } from '../../../src/core/cliErrors.js';

describe('ErrorHandler', () => {
  describe('formatError', () => {
    it('should use the message of errors and strings', () => {
      expect(formatError(new Error('boom'))).toBe('boom');
      expect(formatError('plain')).toBe('plain');
      expect(formatError(42)).toBe('An unexpected error occurred');
    });
  });

  describe('exitCodeFor', () => {
    it('should return 2 for invalid arguments and 1 otherwise', () => {
      expect(exitCodeFor(new ValidationError('bad'))).toBe(2);
      expect(exitCodeFor(new CatalogError('locked'))).toBe(1);
      expect(exitCodeFor(new Error('boom'))).toBe(1);
    });
  });

  describe('handleError', () => {
    it('should log the error with its details', () => {
      const errorSpy = vi.spyOn(logger, 'error').mockImplementation(() => undefined);
      const error = new CatalogError('locked', 'insert');

      expect(handleError(error, { command: 'grid.build' })).toBe('locked');
      expect(errorSpy).toHaveBeenCalledWith(
        'CLI error',
        error,
        expect.objectContaining({ code: 'CATALOG_ERROR', command: 'grid.build' })
      );
    });
  });
});

describe('die', () => {
  let exitSpy: MockInstance<[code?: string | number | null | undefined], never>;

  beforeEach(() => {
    vi.spyOn(logger, 'error').mockImplementation(() => undefined);
    exitSpy = vi.spyOn(process, 'exit').mockImplementation((() => {}) as never);
  });

  it('should print the message and exit with the error code', () => {
    die(new ValidationError('Invalid arguments:\n  jobs: Expected number'));

    expect(console.error).toHaveBeenCalledWith('Error: Invalid arguments:\n  jobs: Expected number');
    expect(exitSpy).toHaveBeenCalledWith(2);
  });

  it('should exit with 1 for other failures', () => {
    die(new Error('disk full'));

    expect(console.error).toHaveBeenCalledWith('Error: disk full');
    expect(exitSpy).toHaveBeenCalledWith(1);
  });
});
