import { z } from 'zod';

export interface EnvelopeMeta {
  requestId: string;
  durationMs: number;
  apiVersion: string;
  [key: string]: unknown;
}

export type SuccessEnvelope<T = unknown> = {
  ok: true;
  data: T;
  meta?: EnvelopeMeta;
};

export type ErrorEnvelope = {
  ok: false;
  error: {
    code: string;
    message: string;
    details?: Record<string, unknown>;
    cause?: unknown;
  };
  meta: EnvelopeMeta;
};

const envelopeMetaSchema = z.object({
  requestId: z.string(),
  durationMs: z.number(),
  apiVersion: z.string(),
});

export const errorEnvelopeSchema = z.object({
  ok: z.literal(false),
  error: z.object({
    code: z.string(),
    message: z.string(),
    details: z.record(z.string(), z.unknown()).optional(),
    cause: z.unknown().optional(),
  }),
  meta: envelopeMetaSchema,
});
