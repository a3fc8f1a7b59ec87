/**
 * Not Found Middleware
 * ====================
 * Converts unknown routes into a structured 404 error.
 */

import type { RequestHandler } from "express";

import { NotFoundError } from "../shared/errors.js";

export const notFoundHandler: RequestHandler = (req, _res, next) => {
  next(new NotFoundError("Route", req.originalUrl));
};
