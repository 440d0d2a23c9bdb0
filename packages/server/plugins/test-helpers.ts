/**
 * Shared fixtures for provider tests
 */

import { vi } from 'vitest';
import { captureSnapshot, type ArtworkRequest } from '@pixsync/core';

export type Route = [pattern: RegExp, respond: () => Response];

export function requestUrl(input: string | URL | Request): string {
  if (typeof input === 'string') return input;
  return input instanceof URL ? input.href : input.url;
}

/**
 * A fetch stand-in answering from the first matching route, 404 otherwise
 */
export function routeFetch(routes: Route[]) {
  return vi.fn(async (input: string | URL | Request, _init?: RequestInit) => {
    const url = requestUrl(input);
    const route = routes.find(([pattern]) => pattern.test(url));
    return route ? route[1]() : new Response('not found', { status: 404 });
  });
}

export function json(body: unknown): Response {
  return new Response(JSON.stringify(body), {
    status: 200,
    headers: { 'content-type': 'application/json' }
  });
}

export function png(bytes: number[] = [137, 80, 78, 71]): Response {
  return new Response(new Uint8Array(bytes), {
    status: 200,
    headers: { 'content-type': 'image/png' }
  });
}

export function artworkRequest(attributes: Record<string, unknown>): ArtworkRequest {
  return {
    snapshot: captureSnapshot({ entityId: 'media_player.test', state: 'playing', attributes }),
    aiModel: 'turbo',
    signal: new AbortController().signal
  };
}
