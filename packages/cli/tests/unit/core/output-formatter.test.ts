/**
 * Unit tests for Output Formatter
 */

import { describe, it, expect } from 'vitest';
import {
  formatCSV,
  formatJSON,
  formatOutput,
  formatTable,
  isOutputFormat,
} from '../../../src/core/output-formatter.js';

describe('OutputFormatter', () => {
  describe('formatJSON', () => {
    it('should pretty-print with two spaces', () => {
      expect(formatJSON({ jobId: 0 })).toBe('{\n  "jobId": 0\n}');
    });
  });

  describe('formatTable', () => {
    it('should pad columns to their widest value', () => {
      const data = [
        { a: 1, b: 'xy' },
        { a: 22, b: 'z' },
      ];

      expect(formatTable(data)).toBe(['a  | b ', '---|---', '1  | xy', '22 | z '].join('\n'));
    });

    it('should render nested values as compact JSON', () => {
      expect(formatTable([{ parameters: { m1: 10 } }])).toBe(
        ['parameters', '----------', '{"m1":10}'.padEnd(10)].join('\n')
      );
    });

    it('should handle empty array', () => {
      expect(formatTable([])).toBe('No data to display');
    });
  });

  describe('formatCSV', () => {
    it('should quote values containing separators', () => {
      expect(formatCSV([{ name: 'a,b', note: 'say "hi"', n: 1 }])).toBe(
        'name,note,n\n"a,b","say ""hi""",1'
      );
    });

    it('should handle empty array', () => {
      expect(formatCSV([])).toBe('');
    });
  });

  describe('formatOutput', () => {
    it('should wrap a single object as one row', () => {
      expect(formatOutput({ runs: 2 }, 'csv')).toBe('runs\n2');
    });

    it('should print primitives as strings', () => {
      expect(formatOutput(3, 'table')).toBe('3');
    });
  });

  describe('isOutputFormat', () => {
    it('should accept the three formats only', () => {
      expect(isOutputFormat('table')).toBe(true);
      expect(isOutputFormat('json')).toBe(true);
      expect(isOutputFormat('csv')).toBe(true);
      expect(isOutputFormat('yaml')).toBe(false);
      expect(isOutputFormat(undefined)).toBe(false);
    });
  });
});
