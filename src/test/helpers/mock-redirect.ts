import { vi } from 'vitest';
import type { RedirectHandler, RedirectOutcome, RedirectRequest } from '../../types.js';

/**
 * Creates a redirect handler that settles with a scripted outcome.
 */
export function createScriptedRedirectHandler(outcome: RedirectOutcome): {
  handler: RedirectHandler;
  requests: RedirectRequest[];
} {
  const requests: RedirectRequest[] = [];

  const handler = {
    authorize: vi.fn((request: RedirectRequest) => {
      requests.push(request);
      return Promise.resolve(outcome);
    }),
  } satisfies RedirectHandler;

  return { handler, requests };
}

/**
 * Creates a redirect handler that waits until the test settles it.
 */
export function createDeferredRedirectHandler(): {
  handler: RedirectHandler;
  requests: RedirectRequest[];
  settle: (outcome: RedirectOutcome) => void;
} {
  const requests: RedirectRequest[] = [];
  const pending: Array<(outcome: RedirectOutcome) => void> = [];

  const handler: RedirectHandler = {
    authorize(request: RedirectRequest): Promise<RedirectOutcome> {
      requests.push(request);
      return new Promise((resolve) => {
        pending.push(resolve);
      });
    },
  };

  const settle = (outcome: RedirectOutcome): void => {
    const resolve = pending.shift();
    if (!resolve) {
      throw new Error('No authorization is waiting');
    }
    resolve(outcome);
  };

  return { handler, requests, settle };
}
