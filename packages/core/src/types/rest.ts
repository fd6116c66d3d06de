// packages/core/src/types/rest.ts — Transport-level request/response shapes

export type HttpMethod = 'GET' | 'PUT' | 'POST' | 'DELETE';

export type ZosmfRequestType =
  | 'GET_JSON'
  | 'GET_TEXT'
  | 'PUT_JSON'
  | 'PUT_TEXT'
  | 'POST_JSON'
  | 'DELETE_JSON';

export interface HttpRequest {
  method: HttpMethod;
  url: string;
  headers: Record<string, string>;
  body?: string;
  signal?: AbortSignal;
}

export interface HttpResponse {
  statusCode: number;
  statusText: string;
  body: string;
}

/** Performs exactly one HTTP exchange. Implementations never retry. */
export interface HttpExecutor {
  execute(request: HttpRequest): Promise<HttpResponse>;
}
