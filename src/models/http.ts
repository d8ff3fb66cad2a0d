/**
 * @netlens/models - JSON over HTTP
 *
 * The one place vendor transports touch fetch.
 */

import { truncate } from '@netlens/core';
import { HttpError, MalformedResponseError } from '@netlens/fallback';

const ERROR_BODY_LIMIT = 300;

/**
 * POST a JSON body and return the parsed JSON response.
 * Non-2xx -> HttpError; unparsable body -> MalformedResponseError.
 */
export async function postJson(
  vendor: string,
  url: string,
  headers: Record<string, string>,
  body: unknown,
  signal?: AbortSignal,
): Promise<unknown> {
  const response = await fetch(url, {
    method: 'POST',
    headers: { 'Content-Type': 'application/json', ...headers },
    body: JSON.stringify(body),
    signal,
  });

  const text = await response.text();
  if (!response.ok) {
    throw new HttpError(
      `${vendor} HTTP ${response.status}: ${truncate(text.trim(), ERROR_BODY_LIMIT)}`,
      response.status,
    );
  }

  try {
    const parsed: unknown = JSON.parse(text);
    return parsed;
  } catch {
    throw new MalformedResponseError(`${vendor} returned a body that is not JSON`);
  }
}
