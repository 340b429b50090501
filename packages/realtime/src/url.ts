import { ConnectionError } from '@repsync/core';

const SCHEME_MAP: Readonly<Record<string, string>> = {
  'http:': 'ws:',
  'https:': 'wss:',
  'ws:': 'ws:',
  'wss:': 'wss:',
};

/**
 * Build the socket URL for a channel.
 *
 * `http` maps to `ws` and `https` to `wss`; `ws` and `wss` pass through.
 * The endpoint replaces the base URL's path.
 *
 * @throws ConnectionError (REPSYNC_C502) for any other scheme or an unparsable URL
 */
export function toWebSocketUrl(baseUrl: string, endpoint: string): string {
  let url: URL;
  try {
    url = new URL(baseUrl);
  } catch (error) {
    throw new ConnectionError(
      'REPSYNC_C502',
      `Invalid WebSocket URL: ${baseUrl}`,
      { baseUrl },
      error instanceof Error ? error : undefined
    );
  }

  // URL lower-cases the scheme while parsing
  const scheme = SCHEME_MAP[url.protocol];
  if (scheme === undefined) {
    throw new ConnectionError('REPSYNC_C502', `Invalid WebSocket URL: ${baseUrl}`, {
      baseUrl,
      scheme: url.protocol,
    });
  }

  const path = endpoint.startsWith('/') ? endpoint : `/${endpoint}`;
  return `${scheme}//${url.host}${path}`;
}
