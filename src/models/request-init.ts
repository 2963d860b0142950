import { ValidationError } from '../errors/app-error.js';
import { requestInitSchema } from '../schemas/inputs.js';

import { originOf } from './origin.js';
import { Request, type Referrer } from './request.js';

function toReferrer(value: string | undefined): Referrer | undefined {
  if (value === undefined) return undefined;
  if (value === 'no-referrer' || value === 'client') return value;
  return new URL(value);
}

function toBody(value: string | Uint8Array | undefined): Uint8Array | undefined {
  if (value === undefined) return undefined;
  return typeof value === 'string' ? new TextEncoder().encode(value) : value;
}

/** Validates caller input and builds the request the orchestrator consumes. */
export function requestFromInit(input: unknown): Request {
  const parsed = requestInitSchema.safeParse(input);
  if (!parsed.success) {
    throw new ValidationError('Invalid request init', {
      issues: parsed.error.issues.map((issue) => ({
        path: issue.path.join('.'),
        message: issue.message,
      })),
    });
  }

  const init = parsed.data;
  return new Request(new URL(init.url), {
    origin: init.origin ? originOf(new URL(init.origin)) : undefined,
    pipelineId: init.pipelineId,
    method: init.method,
    headers: init.headers,
    body: toBody(init.body),
    mode: init.mode,
    redirectMode: init.redirectMode,
    credentialsMode: init.credentialsMode,
    referrer: toReferrer(init.referrer),
    referrerPolicy: init.referrerPolicy,
    useCorsPreflight: init.useCorsPreflight,
    localUrlsOnly: init.localUrlsOnly,
    unsafeRequest: init.unsafeRequest,
    destination: init.destination,
  });
}
