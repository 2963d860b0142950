import { randomUUID } from 'node:crypto';
import diagnosticsChannel from 'node:diagnostics_channel';
import { performance } from 'node:perf_hooks';

import type { NetworkError } from '../../errors/app-error.js';
import type { HeaderPair } from '../../models/headers.js';
import type { Response } from '../../models/response.js';

import { logDebug, logError, logWarn } from '../logger.js';

import type { FetchState } from './context.js';

// ---------------------------------------------------------------------------
// Devtools records
// ---------------------------------------------------------------------------

export interface DevtoolsHttpRequest {
  type: 'request';
  url: string;
  method: string;
  headers: HeaderPair[];
  hasBody: boolean;
  pipelineId: string | undefined;
  startedDateTime: string;
  timeStamp: number;
  waitTime: number;
}

export interface DevtoolsHttpResponse {
  type: 'response';
  headers: HeaderPair[];
  status: readonly [code: number, reason: string] | undefined;
  pipelineId: string | undefined;
}

export type DevtoolsEvent = DevtoolsHttpRequest | DevtoolsHttpResponse;

export interface DevtoolsChannel {
  send(event: DevtoolsEvent): void;
}

/**
 * Reports the last request that went to the network and the unfiltered
 * response it produced. Runs once per top-level fetch.
 */
export function emitDevtoolsRecords(state: FetchState): void {
  const channel = state.context.devtools;
  const issued = state.lastIssued;
  if (!channel || !issued) return;

  channel.send({
    type: 'request',
    url: issued.url.href,
    method: issued.method,
    headers: issued.headers,
    hasBody: issued.hasBody,
    pipelineId: issued.pipelineId,
    startedDateTime: issued.startedAt.toISOString(),
    timeStamp: issued.startedAt.getTime(),
    waitTime: issued.waitTime,
  });

  const response = state.lastNetworkResponse;
  if (!response) return;

  channel.send({
    type: 'response',
    headers: [...response.headers].filter(
      ([name]) => name.toLowerCase() !== 'date'
    ),
    status: response.status,
    pipelineId: issued.pipelineId,
  });
}

// ---------------------------------------------------------------------------
// Diagnostics channel + logging
// ---------------------------------------------------------------------------

type FetchChannelEvent =
  | {
      v: 1;
      type: 'start';
      requestId: string;
      method: string;
      url: string;
      pipelineId?: string;
    }
  | {
      v: 1;
      type: 'end';
      requestId: string;
      status: number;
      duration: number;
      pipelineId?: string;
    }
  | {
      v: 1;
      type: 'error';
      requestId: string;
      url: string;
      error: string;
      kind: string;
      duration: number;
      pipelineId?: string;
    };

export const FETCH_CHANNEL_NAME = 'fetch-engine.fetch';

const fetchChannel = diagnosticsChannel.channel(FETCH_CHANNEL_NAME);

const SLOW_REQUEST_THRESHOLD_MS = 5000;

export interface FetchTelemetryContext {
  requestId: string;
  startTime: number;
  url: string;
  method: string;
  pipelineId?: string;
}

export function redactUrl(url: URL): string {
  if (!url.username && !url.password) return url.href;
  const copy = new URL(url.href);
  copy.username = '';
  copy.password = '';
  return copy.href;
}

export class FetchTelemetry {
  start(url: URL, method: string, pipelineId?: string): FetchTelemetryContext {
    const ctx: FetchTelemetryContext = {
      requestId: randomUUID(),
      startTime: performance.now(),
      url: redactUrl(url),
      method,
    };
    if (pipelineId) ctx.pipelineId = pipelineId;

    this.publish({
      v: 1,
      type: 'start',
      requestId: ctx.requestId,
      method: ctx.method,
      url: ctx.url,
      ...(pipelineId ? { pipelineId } : {}),
    });

    logDebug('HTTP Request', {
      requestId: ctx.requestId,
      method: ctx.method,
      url: ctx.url,
    });

    return ctx;
  }

  elapsed(context: FetchTelemetryContext): number {
    return performance.now() - context.startTime;
  }

  recordResponse(context: FetchTelemetryContext, response: Response): void {
    const duration = this.elapsed(context);
    const durationLabel = `${Math.round(duration)}ms`;
    const status = response.status?.[0] ?? 0;

    this.publish({
      v: 1,
      type: 'end',
      requestId: context.requestId,
      status,
      duration,
      ...(context.pipelineId ? { pipelineId: context.pipelineId } : {}),
    });

    const contentType = response.headers.get('content-type');
    logDebug('HTTP Response', {
      requestId: context.requestId,
      status,
      url: context.url,
      duration: durationLabel,
      ...(contentType ? { contentType } : {}),
    });

    if (duration > SLOW_REQUEST_THRESHOLD_MS) {
      logWarn('Slow HTTP request detected', {
        requestId: context.requestId,
        url: context.url,
        duration: durationLabel,
      });
    }
  }

  recordError(context: FetchTelemetryContext, error: NetworkError): void {
    const duration = this.elapsed(context);

    this.publish({
      v: 1,
      type: 'error',
      requestId: context.requestId,
      url: context.url,
      error: error.message,
      kind: error.kind,
      duration,
      ...(context.pipelineId ? { pipelineId: context.pipelineId } : {}),
    });

    const logData: Record<string, unknown> = {
      requestId: context.requestId,
      url: context.url,
      kind: error.kind,
      error: error.message,
    };

    if (error.kind === 'aborted') {
      logWarn('HTTP Request Aborted', logData);
      return;
    }

    logError('HTTP Request Error', logData);
  }

  private publish(event: FetchChannelEvent): void {
    if (!fetchChannel.hasSubscribers) return;

    try {
      fetchChannel.publish(event);
    } catch (error) {
      logDebug('Telemetry subscriber threw', {
        error: error instanceof Error ? error.message : 'Unknown error',
      });
    }
  }
}
