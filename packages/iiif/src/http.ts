export interface HttpResponse {
  readonly status: number;
  readonly body: Uint8Array;
}

export type HttpGetFn = (url: string, options: { timeoutMs: number }) => Promise<HttpResponse>;

export const fetchHttpGet: HttpGetFn = async (url, { timeoutMs }) => {
  const res = await fetch(url, {
    redirect: 'follow',
    signal: AbortSignal.timeout(timeoutMs),
  });
  return { status: res.status, body: new Uint8Array(await res.arrayBuffer()) };
};

export function isSuccessStatus(status: number): boolean {
  return status >= 200 && status < 300;
}

export function isRemoteReference(reference: string): boolean {
  return reference.startsWith('http://') || reference.startsWith('https://');
}

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
