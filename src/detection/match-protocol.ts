/**
 * Messages between the engine and the matcher thread. Both directions are
 * validated on receipt; a reply always carries the id of its request.
 */

import { z } from 'zod';
import { logger } from '../logger.js';
import type { Matcher } from './matcher.js';

const frameSchema = z.object({
  width: z.number().int().positive(),
  height: z.number().int().positive(),
  channels: z.union([z.literal(1), z.literal(2), z.literal(3), z.literal(4)]),
  data: z.instanceof(Uint8Array),
});

const templateSchema = z.object({
  width: z.number().int().positive(),
  height: z.number().int().positive(),
  gray: z.instanceof(Uint8Array),
  source: z.string(),
});

export const matchRequestSchema = z.discriminatedUnion('type', [
  z.object({
    type: z.literal('reload'),
    template: templateSchema.nullable(),
    threshold: z.number(),
  }),
  z.object({
    type: z.literal('match'),
    id: z.number().int(),
    // A bad frame still gets a reply, as a non-match
    frame: frameSchema.nullable().catch(null),
  }),
]);

export const matchResponseSchema = z.object({
  type: z.literal('result'),
  id: z.number().int(),
  matched: z.boolean(),
  confidence: z.number(),
});

export type MatchRequest = z.infer<typeof matchRequestSchema>;
export type MatchResponse = z.infer<typeof matchResponseSchema>;

/** The thread side of the channel: parentPort in the worker, a MessagePort in tests. */
export interface MatchEndpoint {
  onMessage(listener: (message: unknown) => void): void;
  post(response: MatchResponse): void;
}

export const workerDataSchema = z.object({ scale: z.number().positive().max(1).default(1) });

/** Answer match requests from one Matcher until the endpoint closes. */
export function serveMatchRequests(endpoint: MatchEndpoint, matcher: Matcher): void {
  endpoint.onMessage((message) => {
    const parsed = matchRequestSchema.safeParse(message);
    if (!parsed.success) {
      logger.warn(`MatchWorker: discarding malformed request (${parsed.error.issues[0]?.message ?? 'invalid'})`);
      return;
    }

    const request = parsed.data;
    switch (request.type) {
      case 'reload':
        matcher.reload(request.template, request.threshold);
        break;
      case 'match': {
        const { matched, confidence } = matcher.isMatch(request.frame);
        endpoint.post({ type: 'result', id: request.id, matched, confidence });
        break;
      }
    }
  });
}
