//src/middleware/requireInternalKey.ts
import type { Request, Response, NextFunction } from "express";

/**
 * Bearer check for deployments that sit behind a trusted frontend.
 * Without a configured key every request passes.
 */
export function requireInternalKey(expected?: string) {
  return (req: Request, res: Response, next: NextFunction) => {
    if (!expected) return next();

    const auth = req.headers.authorization || "";
    if (auth !== `Bearer ${expected}`) {
      return res.status(401).json({ message: "Unauthorized", requestId: req.id });
    }

    return next();
  };
}
