import type { Dispatcher } from 'undici';
import { decodeBody, httpRequest, type HttpMethod, type HttpResponse } from '../../net/httpClient.js';
import type { HostLimiters } from '../../src/core/limiters.js';
import { resultForStatus, type SendResult } from './types.js';

/** Shared HTTP settings handed to every channel constructor. */
export interface ChannelTransport {
  dispatcher?: Dispatcher;
  hostLimiters?: HostLimiters;
  requestTimeoutMs?: number;
}

export const USER_AGENT = 'scan-dispatch-engine/0.1';

export async function callApi(
  transport: ChannelTransport,
  url: string,
  init: { method: HttpMethod; headers?: Record<string, string>; body?: string; signal?: AbortSignal }
): Promise<HttpResponse> {
  const run = () => httpRequest({
    url,
    method: init.method,
    headers: { 'user-agent': USER_AGENT, ...(init.headers ?? {}) },
    body: init.body,
    signal: init.signal,
    dispatcher: transport.dispatcher,
    totalTimeoutMs: transport.requestTimeoutMs,
  });
  return transport.hostLimiters ? transport.hostLimiters.run(url, run) : run();
}

export async function deliverJson(
  transport: ChannelTransport,
  url: string,
  body: string,
  signal: AbortSignal,
  headers: Record<string, string> = {}
): Promise<SendResult> {
  const response = await callApi(transport, url, {
    method: 'POST',
    headers: { 'content-type': 'application/json', ...headers },
    body,
    signal,
  });
  return resultForStatus(response.status, response.ok ? undefined : decodeBody(response));
}
