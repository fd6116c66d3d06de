// packages/core/src/utils/errors.ts

export class ConfigError extends Error {
  constructor(
    message: string,
    public readonly field?: string,
  ) {
    super(message);
    this.name = 'ConfigError';
  }
}

export class ValidationError extends Error {
  constructor(
    message: string,
    public readonly field?: string,
  ) {
    super(message);
    this.name = 'ValidationError';
  }
}

export class ZosmfRemoteError extends Error {
  constructor(
    message: string,
    public readonly statusCode?: number,
    public readonly statusText?: string,
    public readonly body?: string,
  ) {
    super(message);
    this.name = 'ZosmfRemoteError';
  }

  get isUnauthorized(): boolean {
    return this.statusCode === 401;
  }

  get isServerError(): boolean {
    return this.statusCode !== undefined && this.statusCode >= 500;
  }
}

export class NotFoundError extends Error {
  constructor(
    message: string,
    public readonly jobName?: string,
    public readonly jobId?: string,
  ) {
    super(message);
    this.name = 'NotFoundError';
  }
}

export class JobStatusError extends Error {
  constructor(
    message: string,
    public readonly status?: string,
  ) {
    super(message);
    this.name = 'JobStatusError';
  }
}

export class MonitorTimeoutError extends Error {
  constructor(
    message: string,
    public readonly attempts: number,
  ) {
    super(message);
    this.name = 'MonitorTimeoutError';
  }
}
