/**
 * Telegram Bot API Client
 * Thin JSON-over-HTTPS wrapper shared by the blob transport and the bot
 * front-end. Callers validate `result` against their own schema.
 */

import { TransportError } from './transport.errors.js';

const DEFAULT_API_BASE = 'https://api.telegram.org';

export interface TelegramClient {
  call(
    method: string,
    params: Record<string, unknown>,
    signal?: AbortSignal
  ): Promise<unknown>;
}

interface TelegramEnvelope {
  ok?: unknown;
  result?: unknown;
  description?: unknown;
}

function isEnvelope(value: unknown): value is TelegramEnvelope {
  return typeof value === 'object' && value !== null;
}

/**
 * Create a Bot API client
 */
export function createTelegramClient(deps: {
  botToken: string;
  apiBase?: string;
  fetchFn?: typeof fetch;
}): TelegramClient {
  const fetchFn = deps.fetchFn ?? fetch;
  const apiBase = deps.apiBase ?? DEFAULT_API_BASE;

  return {
    async call(
      method: string,
      params: Record<string, unknown>,
      signal?: AbortSignal
    ): Promise<unknown> {
      let response: Response;
      try {
        response = await fetchFn(`${apiBase}/bot${deps.botToken}/${method}`, {
          method: 'POST',
          headers: { 'Content-Type': 'application/json' },
          body: JSON.stringify(params),
          signal,
        });
      } catch (error) {
        if (signal?.aborted === true) {
          throw error;
        }
        const reason = error instanceof Error ? error.message : String(error);
        throw new TransportError(`Telegram ${method} request failed: ${reason}`);
      }

      let body: unknown;
      try {
        body = await response.json();
      } catch {
        throw new TransportError(
          `Telegram ${method} returned a non-JSON body`,
          response.status
        );
      }

      if (!isEnvelope(body) || body.ok !== true) {
        const description =
          isEnvelope(body) && typeof body.description === 'string'
            ? body.description
            : response.statusText;
        throw new TransportError(
          `Telegram ${method} failed: ${description}`,
          response.status
        );
      }

      return body.result;
    },
  };
}
