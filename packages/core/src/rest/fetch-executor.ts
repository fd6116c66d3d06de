// packages/core/src/rest/fetch-executor.ts — HttpExecutor backed by node-fetch

import { Agent } from 'node:https';
import fetch from 'node-fetch';
import type { HttpExecutor, HttpRequest, HttpResponse } from '../types/rest.js';
import { DEFAULT_HTTP_TIMEOUT_MS } from '../utils/constants.js';
import { ZosmfRemoteError } from '../utils/errors.js';

export interface FetchExecutorOptions {
  timeoutMs?: number;
  rejectUnauthorized?: boolean;
}

export class FetchExecutor implements HttpExecutor {
  private readonly timeoutMs: number;
  private readonly agent: Agent;

  constructor(options?: FetchExecutorOptions) {
    this.timeoutMs = options?.timeoutMs ?? DEFAULT_HTTP_TIMEOUT_MS;
    this.agent = new Agent({ rejectUnauthorized: options?.rejectUnauthorized ?? true, keepAlive: true });
  }

  async execute(request: HttpRequest): Promise<HttpResponse> {
    const controller = new AbortController();
    const state = { timedOut: false };
    const timeout = setTimeout(() => {
      state.timedOut = true;
      controller.abort();
    }, this.timeoutMs);
    const onCallerAbort = () => controller.abort();
    request.signal?.addEventListener('abort', onCallerAbort, { once: true });
    if (request.signal?.aborted) controller.abort();

    try {
      const res = await fetch(request.url, {
        method: request.method,
        headers: request.headers,
        body: request.body,
        agent: this.agent,
        signal: controller.signal,
      });
      return { statusCode: res.status, statusText: res.statusText, body: await res.text() };
    } catch (error) {
      if (request.signal?.aborted) {
        const reason: unknown = request.signal.reason;
        throw reason instanceof Error ? reason : new Error('Request aborted');
      }
      if (state.timedOut) {
        throw new ZosmfRemoteError(`${request.method} ${request.url} timed out after ${this.timeoutMs}ms`);
      }
      throw new ZosmfRemoteError(
        `${request.method} ${request.url} failed: ${error instanceof Error ? error.message : String(error)}`,
      );
    } finally {
      clearTimeout(timeout);
      request.signal?.removeEventListener('abort', onCallerAbort);
    }
  }

  /** Release pooled keep-alive sockets. */
  close(): void {
    this.agent.destroy();
  }
}
