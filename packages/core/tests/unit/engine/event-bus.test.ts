import { describe, expect, it } from 'vitest';
import { EventBus } from '../../../src/engine/event-bus.js';
import type { MonitorEvent } from '../../../src/types/events.js';

describe('EventBus', () => {
  it('delivers events to listeners', () => {
    const bus = new EventBus();
    const received: MonitorEvent[] = [];
    bus.on('event', (e) => received.push(e));

    bus.emitEvent({
      type: 'monitor.exhausted',
      kind: 'status',
      jobName: 'PAYROLL',
      jobId: 'JOB01234',
      attempts: 3,
      timestamp: '2026-01-05T08:00:00.000Z',
    });

    expect(received).toEqual([
      {
        type: 'monitor.exhausted',
        kind: 'status',
        jobName: 'PAYROLL',
        jobId: 'JOB01234',
        attempts: 3,
        timestamp: '2026-01-05T08:00:00.000Z',
      },
    ]);
  });

  it('fills in an empty timestamp', () => {
    const bus = new EventBus();
    const received: MonitorEvent[] = [];
    bus.on('event', (e) => received.push(e));

    bus.emitEvent({
      type: 'monitor.started',
      kind: 'message',
      jobName: 'PAYROLL',
      jobId: 'JOB01234',
      target: 'READY',
      maxAttempts: 10,
      timestamp: '',
    });

    expect(received[0].timestamp).toMatch(/^\d{4}-\d{2}-\d{2}T\d{2}:\d{2}:\d{2}\.\d{3}Z$/);
  });

  it('stops delivering after off', () => {
    const bus = new EventBus();
    const received: string[] = [];
    const listener = (e: MonitorEvent) => received.push(e.type);
    bus.on('event', listener);
    bus.off('event', listener);

    bus.emitEvent({ type: 'monitor.exhausted', kind: 'status', jobName: 'A', jobId: 'J1', attempts: 1, timestamp: '' });

    expect(received).toEqual([]);
  });
});
