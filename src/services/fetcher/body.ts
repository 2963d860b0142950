import { logWarn } from '../logger.js';

import type { FetchState, PendingBody } from './context.js';

/**
 * Reads a pending body into its response in arrival order. A stream failure
 * marks the response aborted; the body always ends up done.
 */
export async function pumpBody(
  pending: PendingBody,
  onChunk?: (chunk: Uint8Array) => void
): Promise<void> {
  const { response, stream } = pending;
  try {
    for await (const chunk of stream) {
      response.body.append(chunk);
      onChunk?.(chunk);
    }
  } catch (error) {
    response.aborted = true;
    logWarn('Response body terminated early', {
      url: response.url?.href,
      error: error instanceof Error ? error.message : 'Unknown error',
    });
  } finally {
    response.body.finish();
  }
}

async function discardBody(pending: PendingBody): Promise<void> {
  const iterator = pending.stream[Symbol.asyncIterator]();
  try {
    await iterator.return?.();
  } catch (error) {
    logWarn('Failed to release response body', {
      error: error instanceof Error ? error.message : 'Unknown error',
    });
  }
  pending.response.body.finish();
}

export async function discardPendingBody(state: FetchState): Promise<void> {
  const pending = state.pendingBody;
  if (!pending) return;
  state.pendingBody = undefined;
  await discardBody(pending);
}
