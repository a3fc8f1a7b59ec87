/**
 * Async Handler
 * =============
 * Express 4 does not catch rejected promises from async handlers.
 * Wrap async route handlers with this helper so errors reach the error middleware.
 */

import type { NextFunction, Request, RequestHandler, Response } from "express";

export function asyncHandler(
  handler: (req: Request, res: Response, next: NextFunction) => Promise<void>
): RequestHandler {
  return (req, res, next) => {
    handler(req, res, next).catch(next);
  };
}
