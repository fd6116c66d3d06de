import { describe, expect, it } from 'vitest';
import {
  DEFAULT_JOB_STATUS,
  JOB_STATUS_ORDER,
  isJobStatus,
  isRunningStatus,
  statusOrderIndex,
} from '../../../src/jobs/job-status.js';

describe('job status order', () => {
  it('orders INPUT before ACTIVE before OUTPUT', () => {
    expect(JOB_STATUS_ORDER).toEqual(['INPUT', 'ACTIVE', 'OUTPUT']);
    expect(statusOrderIndex('INPUT')).toBeLessThan(statusOrderIndex('ACTIVE'));
    expect(statusOrderIndex('ACTIVE')).toBeLessThan(statusOrderIndex('OUTPUT'));
  });

  it('returns -1 for unknown statuses', () => {
    expect(statusOrderIndex('HELD')).toBe(-1);
    expect(statusOrderIndex('output')).toBe(-1);
  });

  it('defaults to OUTPUT', () => {
    expect(DEFAULT_JOB_STATUS).toBe('OUTPUT');
  });

  it('recognizes only the three known statuses', () => {
    expect(isJobStatus('ACTIVE')).toBe(true);
    expect(isJobStatus('')).toBe(false);
    expect(isJobStatus('DONE')).toBe(false);
  });

  it('treats everything but INPUT and OUTPUT as running', () => {
    expect(isRunningStatus('ACTIVE')).toBe(true);
    expect(isRunningStatus('INPUT')).toBe(false);
    expect(isRunningStatus('OUTPUT')).toBe(false);
  });
});
