import type { NextFunction, Request, Response } from "express";

// Health conversations must never be cached by browsers or proxies.
export function privacyHeaders(_req: Request, res: Response, next: NextFunction): void {
  res.setHeader("Cache-Control", "no-store, no-cache, must-revalidate, private");
  res.setHeader("Pragma", "no-cache");
  res.setHeader("Expires", "0");
  next();
}
