import type { Request, Response, NextFunction, RequestHandler } from "express";
import type { Caller, WalletAuth } from "../auth/index.js";

/**
 * Request carrying the caller resolved from its session token
 */
export interface CallerRequest extends Request {
  caller?: Caller;
}

/**
 * Require a "Bearer <token>" session and attach the caller
 */
export function requireCaller(auth: WalletAuth): RequestHandler {
  return async (req: CallerRequest, res: Response, next: NextFunction): Promise<void> => {
    const [scheme, token, ...rest] = (req.headers.authorization ?? "").split(" ");

    if (!scheme) {
      res.status(401).json({ error: "Missing Authorization header", code: "MISSING_AUTH" });
      return;
    }
    if (scheme !== "Bearer" || !token || rest.length > 0) {
      res.status(401).json({
        error: "Invalid Authorization header format. Expected: Bearer <token>",
        code: "INVALID_AUTH_FORMAT",
      });
      return;
    }

    try {
      const caller = await auth.authenticate(token);
      if (!caller) {
        res.status(401).json({ error: "Invalid or expired session", code: "INVALID_SESSION" });
        return;
      }
      req.caller = caller;
      next();
    } catch (error) {
      console.error("[Auth] session check failed:", error);
      res.status(500).json({ error: "Internal server error", code: "INTERNAL_ERROR" });
    }
  };
}
