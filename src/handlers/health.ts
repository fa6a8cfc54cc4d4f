import type { Request, Response } from 'express';

export function healthz(_req: Request, res: Response): void {
  res.status(200).type('text/plain').send('ok');
}

/** Ready once the server is listening; outages, hangs and delays don't affect it. */
export function readyz(isReady: () => boolean) {
  return (_req: Request, res: Response): void => {
    if (!isReady()) {
      res.status(503).type('text/plain').send('not ready');
      return;
    }
    res.status(200).type('text/plain').send('ready');
  };
}
