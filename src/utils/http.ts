import type { Logger } from 'pino';
import { TransportError, errorMessage } from './errors.js';

export interface JsonRequest {
  /** Adapter name, used in error codes and messages. */
  adapter: string;
  url: URL;
  timeoutMs: number;
  headers?: Record<string, string>;
  logger?: Logger;
}

/**
 * GET a JSON document. Every failure to obtain a decoded body surfaces as a
 * TransportError; nothing is retried.
 */
export async function fetchJson({ adapter, url, timeoutMs, headers, logger }: JsonRequest): Promise<unknown> {
  let response: Response;
  try {
    response = await fetch(url, {
      headers: { Accept: 'application/json', ...headers },
      signal: AbortSignal.timeout(timeoutMs),
    });
  } catch (error) {
    logger?.error({ err: error, host: url.host }, 'Request failed');
    const reason =
      error instanceof Error && error.name === 'TimeoutError'
        ? `timed out after ${timeoutMs}ms`
        : errorMessage(error);
    throw new TransportError(adapter, `${adapter} request failed: ${reason}`, { cause: error });
  }

  if (!response.ok) {
    logger?.error({ status: response.status, host: url.host }, 'Request returned an error status');
    throw new TransportError(adapter, `${adapter} API error: ${response.status}`, {
      status: response.status,
    });
  }

  try {
    return await response.json();
  } catch (error) {
    throw new TransportError(adapter, `${adapter} returned a body that is not JSON`, {
      cause: error,
      status: response.status,
    });
  }
}
