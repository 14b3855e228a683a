import { describe, it, expect } from '@jest/globals';
import {
  isInsight,
  isPreviewRows,
  isProcessingStatus,
  validateFileExtension,
  validateFilename,
  validateFileSize,
  validateSubjectId,
  ValidationError,
} from '@/lib/validation';

describe('Validation Module', () => {
  describe('validateFilename', () => {
    it('should strip directory components', () => {
      expect(validateFilename('../../etc/sales.csv')).toBe('sales.csv');
      expect(validateFilename('  report.tsv ')).toBe('report.tsv');
    });

    it('should reject missing or oversized names', () => {
      expect(() => validateFilename('')).toThrow(ValidationError);
      expect(() => validateFilename(42)).toThrow('Filename is required');
      expect(() => validateFilename(`${'a'.repeat(252)}.csv`)).toThrow('Filename is too long');
    });
  });

  describe('validateFileExtension', () => {
    it('should accept supported extensions case-insensitively', () => {
      expect(validateFileExtension('data.csv')).toBe('.csv');
      expect(validateFileExtension('DATA.TSV')).toBe('.tsv');
      expect(validateFileExtension('book.xlsx')).toBe('.xlsx');
      expect(validateFileExtension('book.XLS')).toBe('.xls');
    });

    it('should reject everything else', () => {
      expect(() => validateFileExtension('data.txt')).toThrow('Unsupported file type. Allowed: .csv, .tsv, .xls, .xlsx');
      expect(() => validateFileExtension('data')).toThrow(ValidationError);
    });

    it('should honour a narrower allow-list', () => {
      expect(() => validateFileExtension('data.tsv', ['.csv'])).toThrow('Unsupported file type. Allowed: .csv');
    });
  });

  describe('validateFileSize', () => {
    it('should accept sizes up to the limit', () => {
      expect(validateFileSize(1, 10)).toBe(1);
      expect(validateFileSize(10, 10)).toBe(10);
    });

    it('should reject empty and oversized files', () => {
      expect(() => validateFileSize(0, 10)).toThrow('File is empty');
      expect(() => validateFileSize(11, 10)).toThrow('File too large. Max size: 10 bytes');
      expect(() => validateFileSize(-1, 10)).toThrow(ValidationError);
    });
  });

  describe('validateSubjectId', () => {
    it('should normalise UUIDs to lower case', () => {
      expect(validateSubjectId('9B2E4C1A-3F5D-4E6A-8B7C-1D2E3F4A5B6C')).toBe('9b2e4c1a-3f5d-4e6a-8b7c-1d2e3f4a5b6c');
    });

    it('should reject non-UUID ids', () => {
      expect(() => validateSubjectId('subject-1')).toThrow('Subject id must be a UUID');
      expect(() => validateSubjectId(undefined)).toThrow(ValidationError);
    });
  });

  describe('stored shape guards', () => {
    it('should recognise processing statuses', () => {
      expect(isProcessingStatus('completed')).toBe(true);
      expect(isProcessingStatus('done')).toBe(false);
    });

    it('should check insight fields', () => {
      const valid = {
        title: 'Dataset Overview',
        description: 'Dataset contains 2 rows and 1 columns. Column types: {numeric: 1}',
        confidence: 0.95,
        category: 'overview',
        affectedColumns: ['a'],
        affectedRows: [],
      };
      expect(isInsight(valid)).toBe(true);
      expect(isInsight({ ...valid, confidence: 1.5 })).toBe(false);
      expect(isInsight({ ...valid, category: 'trend' })).toBe(false);
      expect(isInsight({ ...valid, affectedRows: [0.5] })).toBe(false);
    });

    it('should check preview rows', () => {
      expect(isPreviewRows([['a', 'b'], [1, null]])).toBe(true);
      expect(isPreviewRows([['a', { nested: true }]])).toBe(false);
      expect(isPreviewRows('a,b')).toBe(false);
    });
  });
});
