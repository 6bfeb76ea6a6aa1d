/**
 * Minimal fetch contract so registry and health clients can be given an in-process stand-in
 */

export interface HttpRequestInit {
  method?: string;
  headers?: Record<string, string>;
  signal?: AbortSignal;
}

export interface HttpResponse {
  ok: boolean;
  status: number;
  headers: { get(name: string): string | null };
  json(): Promise<unknown>;
}

export type HttpFetch = (url: string, init?: HttpRequestInit) => Promise<HttpResponse>;

export const defaultFetch: HttpFetch = (url, init) => fetch(url, init);
