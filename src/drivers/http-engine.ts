import axios from 'axios';
import type { AxiosInstance } from 'axios';
import type { FetchEngine, FetchOutcome, FetchRequest } from '../types/fetch.js';
import { classifyError, classifyResponse } from './response-classifier.js';
import { formatProxyForAxios } from './proxy.js';
import { logger } from '../utils/logger.js';

const log = logger.createContext('http-engine');

export type HttpClient = Pick<AxiosInstance, 'get'>;

function finalUrlOf(request: unknown, fallback: string): string {
  if (typeof request === 'object' && request !== null && 'res' in request) {
    const res = request.res;
    if (typeof res === 'object' && res !== null && 'responseUrl' in res && typeof res.responseUrl === 'string') {
      return res.responseUrl;
    }
  }
  return fallback;
}

/**
 * Plain HTTP engine: one GET per page, no script execution.
 */
export class HttpEngine implements FetchEngine {
  readonly name = 'http' as const;

  constructor(private readonly client: HttpClient = axios.create({ maxRedirects: 5 })) {}

  async fetch(url: string, request: FetchRequest): Promise<FetchOutcome> {
    const startTime = Date.now();
    try {
      const response = await this.client.get<string>(url, {
        timeout: request.timeoutMs,
        headers: request.headers,
        responseType: 'text',
        proxy: request.proxy ? formatProxyForAxios(request.proxy) : undefined,
        // Status codes are classified below, not thrown
        validateStatus: () => true
      });

      const html = typeof response.data === 'string' ? response.data : String(response.data ?? '');
      log.debug(`GET ${url} -> ${response.status} in ${Date.now() - startTime}ms`);
      return classifyResponse(url, response.status, html, request.minContentBytes, finalUrlOf(response.request, url));
    } catch (error) {
      const fetchError = classifyError(url, error);
      log.debug(`GET ${url} failed (${fetchError.kind}): ${fetchError.message}`);
      return { ok: false, error: fetchError };
    }
  }

  async close(): Promise<void> {
    // No pooled resources beyond the axios agent
  }
}
