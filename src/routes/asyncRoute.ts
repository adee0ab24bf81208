import type { NextFunction, Request, RequestHandler, Response } from 'express';

/** Forwards rejected handler promises to the express error middleware. */
export function asyncRoute(handler: (req: Request, res: Response) => Promise<void>): RequestHandler {
  return (req: Request, res: Response, next: NextFunction) => {
    handler(req, res).catch(next);
  };
}
