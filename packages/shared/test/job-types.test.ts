import { describe, it, expect } from 'vitest';
import {
  JobStatus,
  expandStatusAliases,
  isTerminalJobStatus,
  jobCacheDocumentSchema,
} from '../src/types/job.js';

describe('Job Types', () => {
  describe('isTerminalJobStatus', () => {
    it('should accept both spellings of finished statuses', () => {
      expect(isTerminalJobStatus(JobStatus.SUCCEEDED)).toBe(true);
      expect(isTerminalJobStatus(JobStatus.JOB_FAILED)).toBe(true);
      expect(isTerminalJobStatus(JobStatus.JOB_CANCELLED)).toBe(true);
    });

    it('should reject in-flight and missing statuses', () => {
      expect(isTerminalJobStatus(JobStatus.RUNNING)).toBe(false);
      expect(isTerminalJobStatus(JobStatus.JOB_PENDING)).toBe(false);
      expect(isTerminalJobStatus(null)).toBe(false);
      expect(isTerminalJobStatus(undefined)).toBe(false);
    });
  });

  describe('expandStatusAliases', () => {
    it('should add the upper-case and job_ spellings', () => {
      expect([...expandStatusAliases(['running'])].sort()).toEqual(['RUNNING', 'job_running', 'running']);
      expect([...expandStatusAliases(['job_failed'])].sort()).toEqual(['FAILED', 'job_failed']);
      expect([...expandStatusAliases(['SUCCEEDED'])].sort()).toEqual(['SUCCEEDED', 'job_succeeded']);
    });

    it('should skip blank entries', () => {
      expect(expandStatusAliases(['', '  '])).toEqual(new Set());
    });
  });

  describe('jobCacheDocumentSchema', () => {
    it('should fill defaults and keep extra fields', () => {
      const result = jobCacheDocumentSchema.safeParse({
        j1: { created_at: '2024-05-01T00:00:00.000Z', log_byte_offset: 12, gpu_count: 2 },
      });

      expect(result.success).toBe(true);
      expect(result.data?.['j1']).toEqual({
        name: '',
        resource: '',
        command: '',
        status: 'PENDING',
        created_at: '2024-05-01T00:00:00.000Z',
        log_byte_offset: 12,
        gpu_count: 2,
      });
    });

    it('should reject negative offsets', () => {
      const result = jobCacheDocumentSchema.safeParse({
        j1: { created_at: '2024-05-01T00:00:00.000Z', log_byte_offset: -1 },
      });

      expect(result.success).toBe(false);
    });
  });
});
