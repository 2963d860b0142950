import type { Request } from '../../models/request.js';
import type { Response } from '../../models/response.js';

import { logError } from '../logger.js';

/**
 * Receives the progress of one fetch. Calls arrive in order: request body,
 * request EOF, response, zero or more chunks, then exactly one response EOF.
 */
export interface FetchTaskTarget {
  processRequestBody?(request: Request): void;
  processRequestEof?(request: Request): void;
  processResponse?(response: Response): void;
  processResponseChunk?(chunk: Uint8Array): void;
  processResponseEof?(response: Response): void;
}

export class NoopFetchTarget implements FetchTaskTarget {}

/** Settles with the final response once its body has reached EOF. */
export class ResponseCollector implements FetchTaskTarget {
  readonly response: Promise<Response>;
  private resolve: (response: Response) => void = () => undefined;

  constructor() {
    this.response = new Promise<Response>((resolve) => {
      this.resolve = resolve;
    });
  }

  processResponseEof(response: Response): void {
    this.resolve(response);
  }
}

function reportCallbackFailure(callback: string, error: unknown): void {
  logError('Fetch target callback failed', {
    callback,
    error: error instanceof Error ? error.message : String(error),
  });
}

/**
 * Forwards to another target, logging anything its callbacks throw so the
 * rest of the delivery still runs. Response EOF is forwarded at most once.
 */
export class GuardedFetchTarget implements FetchTaskTarget {
  private eofSent = false;

  private constructor(private readonly inner: FetchTaskTarget) {}

  static wrap(target: FetchTaskTarget): GuardedFetchTarget {
    return target instanceof GuardedFetchTarget
      ? target
      : new GuardedFetchTarget(target);
  }

  get eofDelivered(): boolean {
    return this.eofSent;
  }

  processRequestBody(request: Request): void {
    try {
      this.inner.processRequestBody?.(request);
    } catch (error) {
      reportCallbackFailure('processRequestBody', error);
    }
  }

  processRequestEof(request: Request): void {
    try {
      this.inner.processRequestEof?.(request);
    } catch (error) {
      reportCallbackFailure('processRequestEof', error);
    }
  }

  processResponse(response: Response): void {
    try {
      this.inner.processResponse?.(response);
    } catch (error) {
      reportCallbackFailure('processResponse', error);
    }
  }

  processResponseChunk(chunk: Uint8Array): void {
    try {
      this.inner.processResponseChunk?.(chunk);
    } catch (error) {
      reportCallbackFailure('processResponseChunk', error);
    }
  }

  processResponseEof(response: Response): void {
    if (this.eofSent) return;
    this.eofSent = true;
    try {
      this.inner.processResponseEof?.(response);
    } catch (error) {
      reportCallbackFailure('processResponseEof', error);
    }
  }
}
