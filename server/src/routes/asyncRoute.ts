// server/src/routes/asyncRoute.ts
import type { NextFunction, Request, RequestHandler, Response } from "express";

/** Express 4 fanger ikke avviste promises selv – send dem videre til feil-middleware */
export function asyncRoute(
  fn: (req: Request, res: Response, next: NextFunction) => Promise<void>
): RequestHandler {
  return (req, res, next) => {
    fn(req, res, next).catch(next);
  };
}
