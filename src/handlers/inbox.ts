import type { NextFunction, Request, RequestHandler, Response } from 'express';
import type { FaultInjectionPipeline, InboxExchange } from '../faults/pipeline.js';

/**
 * Resolves when the response's connection goes away. For a request that
 * never gets an answer this only happens when the client disconnects or
 * the server force-closes its sockets on shutdown.
 */
function connectionClosed(res: Response): Promise<void> {
  return new Promise((resolve) => {
    if (res.closed || res.socket === null || res.socket.destroyed) {
      resolve();
      return;
    }
    res.once('close', () => resolve());
  });
}

export function createInboxHandler(pipeline: FaultInjectionPipeline): RequestHandler {
  return (_req: Request, res: Response, next: NextFunction) => {
    const exchange: InboxExchange = {
      respond: (status, body) => {
        if (res.writableEnded || res.destroyed) return;
        res.status(status).type('text/plain').send(body);
      },
      closed: connectionClosed(res),
    };

    pipeline.handle(exchange).catch(next);
  };
}
