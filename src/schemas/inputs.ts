import { z } from 'zod';

const headerValuesSchema = z.union([z.string(), z.array(z.string())]);

export const requestInitSchema = z.strictObject({
  url: z.url().describe('Target URL of the first hop.'),
  method: z
    .string()
    .regex(/^[!#$%&'*+\-.^_`|~0-9A-Za-z]+$/, 'Method must be an HTTP token')
    .optional(),
  headers: z
    .union([
      z.record(z.string(), headerValuesSchema),
      z.array(z.tuple([z.string(), z.string()])),
    ])
    .optional(),
  body: z.union([z.string(), z.instanceof(Uint8Array)]).optional(),
  mode: z.enum(['no-cors', 'same-origin', 'cors', 'navigate']).optional(),
  credentialsMode: z.enum(['omit', 'same-origin', 'include']).optional(),
  redirectMode: z.enum(['follow', 'error', 'manual']).optional(),
  referrer: z
    .union([z.literal('no-referrer'), z.literal('client'), z.url()])
    .optional(),
  referrerPolicy: z
    .enum([
      'no-referrer',
      'no-referrer-when-downgrade',
      'origin',
      'origin-when-cross-origin',
      'same-origin',
      'strict-origin',
      'strict-origin-when-cross-origin',
      'unsafe-url',
    ])
    .optional(),
  origin: z
    .url()
    .optional()
    .describe('Requesting origin. Omitted means an opaque origin.'),
  useCorsPreflight: z.boolean().optional(),
  localUrlsOnly: z.boolean().optional(),
  unsafeRequest: z.boolean().optional(),
  destination: z
    .enum(['', 'document', 'iframe', 'image', 'media', 'script', 'style'])
    .optional(),
  pipelineId: z.string().min(1).optional(),
});

export type RequestInit = z.infer<typeof requestInitSchema>;
