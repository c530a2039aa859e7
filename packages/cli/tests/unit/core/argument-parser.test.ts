/**
 * Unit tests for Argument Parser and the validation pipeline
 */

import { describe, it, expect } from 'vitest';
import { z } from 'zod';
import { ValidationError } from '@stellar-grid/utils';
import { normalizeOptions, parseArguments } from '../../../src/core/argument-parser.js';
import { validateAndCoerceArgs } from '../../../src/core/validation-pipeline.js';
import { buildGridSchema } from '../../../src/command-defs/grid.js';
import { listCatalogSchema } from '../../../src/command-defs/catalog.js';

describe('parseArguments', () => {
  it('should return parsed arguments with defaults', () => {
    expect(parseArguments(buildGridSchema, { jobs: 2 })).toEqual({ jobs: 2, format: 'table' });
  });

  it('should list every invalid path', () => {
    const schema = z.object({ jobs: z.number(), format: z.enum(['table', 'json']) });

    expect(() => parseArguments(schema, { jobs: 'two', format: 'yaml' })).toThrow(ValidationError);
    expect(() => parseArguments(schema, { jobs: 'two', format: 'yaml' })).toThrow(
      /Invalid arguments:\n {2}jobs: .*\n {2}format: /
    );
  });
});

describe('normalizeOptions', () => {
  it('should drop unset options and keep values as given', () => {
    expect(
      normalizeOptions({
        overwrite: true,
        jobs: '4',
        config: 'grid-config.yaml',
        missing: undefined,
        cleared: null,
      })
    ).toEqual({
      overwrite: true,
      jobs: '4',
      config: 'grid-config.yaml',
    });
  });
});

describe('validateAndCoerceArgs', () => {
  it('should normalize then validate', () => {
    expect(
      validateAndCoerceArgs(buildGridSchema, { parallel: 3, format: 'json', jobs: undefined })
    ).toEqual({ parallel: 3, format: 'json' });
  });

  it('should keep numeric-looking strings for string options', () => {
    expect(validateAndCoerceArgs(listCatalogSchema, { status: '1', config: '2024', job: 0 })).toEqual({
      status: '1',
      config: '2024',
      job: 0,
      format: 'table',
    });
  });

  it('should leave number conversion to the command coerce step', () => {
    expect(() => validateAndCoerceArgs(buildGridSchema, { jobs: '4' })).toThrow(
      /Invalid arguments:\n {2}jobs: /
    );
  });

  it('should reject a non-positive job count', () => {
    expect(() => validateAndCoerceArgs(buildGridSchema, { jobs: 0 })).toThrow(ValidationError);
  });
});
