// packages/core/src/rest/zosmf-rest-client.ts — Request builder and response checks for z/OSMF

import type { z } from 'zod';
import type { ZosConnection } from '../types/connection.js';
import type { HttpExecutor, HttpMethod, HttpResponse, ZosmfRequestType } from '../types/rest.js';
import { basicAuthHeader } from '../utils/encode.js';
import { ValidationError, ZosmfRemoteError } from '../utils/errors.js';
import { silentLogger, type Logger } from '../utils/logger.js';
import { requireIntInRange, requireNonEmpty } from '../utils/validate.js';
import { ZosmfHeaders, headerOf } from './headers.js';

export interface ZosmfRequestOptions {
  query?: Record<string, string | number | undefined>;
  headers?: Record<string, string>;
  body?: string;
  signal?: AbortSignal;
}

const METHOD_BY_TYPE: Record<ZosmfRequestType, HttpMethod> = {
  GET_JSON: 'GET',
  GET_TEXT: 'GET',
  PUT_JSON: 'PUT',
  PUT_TEXT: 'PUT',
  POST_JSON: 'POST',
  DELETE_JSON: 'DELETE',
};

/** Largest response excerpt carried into error messages. */
const ERROR_BODY_EXCERPT = 500;

export function isHttpError(statusCode: number): boolean {
  return statusCode < 200 || statusCode >= 300;
}

export class ZosmfRestClient {
  constructor(
    readonly connection: ZosConnection,
    private readonly executor: HttpExecutor,
    private readonly logger: Logger = silentLogger,
  ) {
    requireNonEmpty(connection.host, 'host');
    requireNonEmpty(connection.user, 'user');
    requireNonEmpty(connection.password, 'password');
    requireIntInRange(connection.port, 'port', 1, 65535);
  }

  /** `https://host:port[/basePath]` + path + query string. */
  buildUrl(path: string, query?: Record<string, string | number | undefined>): string {
    if (!path.startsWith('/')) {
      throw new ValidationError(`path must start with "/": ${path}`, 'path');
    }
    const basePath = this.connection.basePath ? `/${this.connection.basePath.replace(/^\/+|\/+$/g, '')}` : '';
    const params = new URLSearchParams();
    for (const [key, value] of Object.entries(query ?? {})) {
      if (value !== undefined) params.append(key, String(value));
    }
    const qs = params.toString();
    return `https://${this.connection.host}:${this.connection.port}${basePath}${path}${qs ? `?${qs}` : ''}`;
  }

  /**
   * Issue one request of the given kind. Non-2xx responses throw
   * ZosmfRemoteError carrying the status code, status text and body.
   */
  async request(type: ZosmfRequestType, path: string, options?: ZosmfRequestOptions): Promise<HttpResponse> {
    const url = this.buildUrl(path, options?.query);
    const headers: Record<string, string> = {
      Authorization: basicAuthHeader(this.connection),
      ...headerOf(ZosmfHeaders.CSRF),
      ...defaultHeadersFor(type),
      ...options?.headers,
    };
    const method = METHOD_BY_TYPE[type];
    this.logger.debug(`${method} ${url}`);

    const response = await this.executor.execute({
      method,
      url,
      headers,
      body: options?.body,
      signal: options?.signal,
    });

    if (isHttpError(response.statusCode)) {
      this.logger.debug(`Rest status code ${response.statusCode}`);
      this.logger.debug(`Rest status text ${response.statusText}`);
      const excerpt = response.body.slice(0, ERROR_BODY_EXCERPT);
      throw new ZosmfRemoteError(
        `${method} ${url} returned ${response.statusCode} ${response.statusText}${excerpt ? `: ${excerpt}` : ''}`,
        response.statusCode,
        response.statusText,
        response.body,
      );
    }
    return response;
  }

  /** GET a JSON document and validate it against `schema`. */
  async getJson<S extends z.ZodTypeAny>(path: string, schema: S, options?: ZosmfRequestOptions): Promise<z.output<S>> {
    const response = await this.request('GET_JSON', path, options);
    return parseJsonBody(response, schema);
  }

  async getText(path: string, options?: ZosmfRequestOptions): Promise<string> {
    const response = await this.request('GET_TEXT', path, options);
    return response.body;
  }

  async putJson<S extends z.ZodTypeAny>(
    path: string,
    body: unknown,
    schema: S,
    options?: ZosmfRequestOptions,
  ): Promise<z.output<S>> {
    const response = await this.request('PUT_JSON', path, { ...options, body: JSON.stringify(body) });
    return parseJsonBody(response, schema);
  }

  async putText<S extends z.ZodTypeAny>(
    path: string,
    text: string,
    schema: S,
    options?: ZosmfRequestOptions,
  ): Promise<z.output<S>> {
    const response = await this.request('PUT_TEXT', path, { ...options, body: text });
    return parseJsonBody(response, schema);
  }

  async deleteJson(path: string, options?: ZosmfRequestOptions): Promise<HttpResponse> {
    return this.request('DELETE_JSON', path, options);
  }
}

function defaultHeadersFor(type: ZosmfRequestType): Record<string, string> {
  switch (type) {
    case 'GET_JSON':
      return headerOf(ZosmfHeaders.ACCEPT_JSON);
    case 'PUT_JSON':
    case 'POST_JSON':
    case 'DELETE_JSON':
      return headerOf(ZosmfHeaders.APPLICATION_JSON);
    case 'PUT_TEXT':
      return headerOf(ZosmfHeaders.TEXT_PLAIN);
    case 'GET_TEXT':
      return {};
  }
}

function parseJsonBody<S extends z.ZodTypeAny>(response: HttpResponse, schema: S): z.output<S> {
  let raw: unknown;
  try {
    raw = JSON.parse(response.body);
  } catch (err) {
    throw new ZosmfRemoteError(
      `Unparsable JSON response: ${err instanceof Error ? err.message : String(err)}`,
      response.statusCode,
      response.statusText,
      response.body,
    );
  }
  const result = schema.safeParse(raw);
  if (!result.success) {
    const issues = result.error.issues.map((i) => `${i.path.join('.') || 'root'}: ${i.message}`).join('; ');
    throw new ZosmfRemoteError(
      `Unexpected response shape: ${issues}`,
      response.statusCode,
      response.statusText,
      response.body,
    );
  }
  return result.data;
}
