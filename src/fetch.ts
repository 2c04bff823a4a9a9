import fetch, { type RequestInit, type Response } from 'node-fetch';

export type FetchFn = (url: string, init?: RequestInit) => Promise<Response>;

export const defaultFetch: FetchFn = (url, init) => fetch(url, init);

export type TextRequest = {
  timeoutMs: number;
  userAgent: string;
  accept?: string;
};

export type TextResponse = {
  text: string;
  contentType: string;
};

/** GET a text body. Non-2xx answers and timeouts reject like transport errors do. */
export async function fetchText(fetchFn: FetchFn, url: string, req: TextRequest): Promise<TextResponse> {
  const res = await fetchFn(url, {
    timeout: req.timeoutMs,
    headers: { 'user-agent': req.userAgent, accept: req.accept || '*/*' },
  });
  if (!res.ok) throw new Error(`GET ${url} failed: ${res.status}`);
  const text = await res.text();
  return { text, contentType: res.headers.get('content-type') || '' };
}
