import type { VercelRequest, VercelResponse } from '@vercel/node';
import { dispatch, headerValue, queryParam } from '../../../src/http.js';
import { parseEventTypes, streamEvents } from '../../../src/status.js';

/**
 * GET /v1/status/stream - server-sent coordination events
 *
 * Resumes after Last-Event-ID when the client sends one. `?event_types=bead,claim`
 * limits the stream to those event categories.
 */
export default async function handler(req: VercelRequest, res: VercelResponse) {
  return dispatch(req, res, {
    GET: async ({ ctx, identity }) => {
      const caller = await identity();
      const lastEventId = Number(headerValue(req, 'last-event-id'));

      res.writeHead(200, {
        'Content-Type': 'text/event-stream',
        'Cache-Control': 'no-cache',
        Connection: 'keep-alive',
      });

      const abort = new AbortController();
      res.on('close', () => abort.abort());
      await streamEvents(ctx, caller, res, {
        signal: abort.signal,
        afterSeq: Number.isInteger(lastEventId) && lastEventId >= 0 ? lastEventId : undefined,
        eventTypes: parseEventTypes(queryParam(req, 'event_types')),
      });
      res.end();
      return undefined;
    },
  });
}
