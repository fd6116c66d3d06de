// packages/core/src/types/events.ts — Monitor events for progress rendering

export type WaitKind = 'status' | 'message';

export interface MonitorStartedEvent {
  type: 'monitor.started';
  kind: WaitKind;
  jobName: string;
  jobId: string;
  target: string;
  maxAttempts: number;
  timestamp: string;
}

export interface MonitorPollEvent {
  type: 'monitor.poll';
  kind: WaitKind;
  jobName: string;
  jobId: string;
  attempt: number;
  maxAttempts: number;
  /** Status seen on this poll; absent for message polls. */
  status?: string;
  found: boolean;
  timestamp: string;
}

export interface MonitorCompletedEvent {
  type: 'monitor.completed';
  kind: WaitKind;
  jobName: string;
  jobId: string;
  attempts: number;
  found: boolean;
  status?: string;
  timestamp: string;
}

export interface MonitorExhaustedEvent {
  type: 'monitor.exhausted';
  kind: WaitKind;
  jobName: string;
  jobId: string;
  attempts: number;
  timestamp: string;
}

export type MonitorEvent =
  | MonitorStartedEvent
  | MonitorPollEvent
  | MonitorCompletedEvent
  | MonitorExhaustedEvent;
