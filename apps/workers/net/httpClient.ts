import { Agent, Dispatcher, request, interceptors } from 'undici';

export type HttpMethod = 'GET' | 'POST' | 'HEAD' | 'PUT' | 'PATCH' | 'DELETE';

export interface HttpRequestOptions {
  url: string;
  method?: HttpMethod;
  headers?: Record<string, string>;
  body?: string | Buffer | Uint8Array;
  totalTimeoutMs?: number;
  firstByteTimeoutMs?: number;
  idleSocketTimeoutMs?: number;
  maxBodyBytes?: number;
  /** Caller-side cancellation, e.g. the dispatcher's per-attempt timeout. */
  signal?: AbortSignal;
  /** Overrides the shared agent (tests pass an undici MockAgent here). */
  dispatcher?: Dispatcher;
}

export interface HttpResponse {
  url: string;
  status: number;
  ok: boolean;
  headers: Record<string, string>;
  body: Uint8Array;
}

const DEFAULTS = {
  totalTimeoutMs: 10_000,
  connectTimeoutMs: 3_000,
  firstByteTimeoutMs: 5_000,
  idleSocketTimeoutMs: 5_000,
  maxBodyBytes: 1_000_000,
  maxRedirects: 3,
} as const;

const sharedAgent = new Agent({
  connect: {
    timeout: DEFAULTS.connectTimeoutMs,
  },
  bodyTimeout: DEFAULTS.idleSocketTimeoutMs,
  headersTimeout: DEFAULTS.firstByteTimeoutMs,
  keepAliveTimeout: 5000,
  keepAliveMaxTimeout: 10000,
  pipelining: 0,
}).compose(interceptors.redirect({ maxRedirections: DEFAULTS.maxRedirects }));

function headersToObject(headers: Record<string, string | string[] | undefined>): Record<string, string> {
  const obj: Record<string, string> = {};
  for (const [k, v] of Object.entries(headers)) {
    if (v === undefined) continue;
    obj[k.toLowerCase()] = Array.isArray(v) ? v.join(', ') : v;
  }
  return obj;
}

function errorCode(err: unknown): string | undefined {
  if (typeof err !== 'object' || err === null) return undefined;
  if ('code' in err && typeof err.code === 'string') return err.code;
  if ('name' in err && typeof err.name === 'string') return err.name;
  return undefined;
}

export async function httpRequest(opts: HttpRequestOptions): Promise<HttpResponse> {
  const {
    url,
    method = 'GET',
    headers = {},
    body,
    totalTimeoutMs = DEFAULTS.totalTimeoutMs,
    firstByteTimeoutMs = DEFAULTS.firstByteTimeoutMs,
    idleSocketTimeoutMs = DEFAULTS.idleSocketTimeoutMs,
    maxBodyBytes = DEFAULTS.maxBodyBytes,
    signal,
    dispatcher = sharedAgent,
  } = opts;

  if (signal?.aborted) {
    throw new Error('Request aborted');
  }

  const abortController = new AbortController();
  const totalTimer = setTimeout(() => abortController.abort(), totalTimeoutMs);
  const onCallerAbort = () => abortController.abort();
  signal?.addEventListener('abort', onCallerAbort, { once: true });

  try {
    const { statusCode, headers: respHeaders, body: respBody } = await request(url, {
      method,
      headers,
      body,
      dispatcher,
      signal: abortController.signal,
      bodyTimeout: idleSocketTimeoutMs,
      headersTimeout: firstByteTimeoutMs,
    });

    // Read the body with size limit
    const chunks: Uint8Array[] = [];
    let received = 0;

    for await (const chunk of respBody) {
      const data = chunk instanceof Buffer ? new Uint8Array(chunk) : chunk;
      received += data.byteLength;

      if (received > maxBodyBytes) {
        respBody.destroy();
        throw new Error(`Body too large (> ${maxBodyBytes} bytes)`);
      }

      chunks.push(data);
    }

    const bodyData = new Uint8Array(received);
    let offset = 0;
    for (const chunk of chunks) {
      bodyData.set(chunk, offset);
      offset += chunk.byteLength;
    }

    return {
      url,
      status: statusCode,
      ok: statusCode >= 200 && statusCode < 300,
      headers: headersToObject(respHeaders),
      body: bodyData,
    };
  } catch (err) {
    const code = errorCode(err);
    if (code === 'AbortError' || code === 'UND_ERR_ABORTED') {
      throw new Error(signal?.aborted ? 'Request aborted' : `Request timeout after ${totalTimeoutMs}ms`);
    }
    if (code === 'UND_ERR_HEADERS_TIMEOUT') {
      throw new Error(`First byte timeout after ${firstByteTimeoutMs}ms`);
    }
    if (code === 'UND_ERR_BODY_TIMEOUT') {
      throw new Error(`Body read timeout after ${idleSocketTimeoutMs}ms`);
    }
    if (code === 'UND_ERR_CONNECT_TIMEOUT') {
      throw new Error(`Connection timeout after ${DEFAULTS.connectTimeoutMs}ms`);
    }
    throw err;
  } finally {
    clearTimeout(totalTimer);
    signal?.removeEventListener('abort', onCallerAbort);
  }
}

export function decodeBody(response: HttpResponse): string {
  return new TextDecoder('utf-8').decode(response.body);
}
