import { Router, type Request, type Response } from "express";
import { AuthError, type WalletAuth } from "../auth/index.js";
import { requireCaller, type CallerRequest } from "../middleware/index.js";
import { readField } from "./body.js";

function sendAuthError(res: Response, err: unknown): void {
  if (err instanceof AuthError) {
    res.status(err.code === "INVALID_SIGNATURE" ? 401 : 400).json({ error: err.message, code: err.code });
    return;
  }
  console.error("[Auth] sign-in failed:", err);
  res.status(500).json({ error: "Internal server error", code: "INTERNAL_ERROR" });
}

/**
 * Wallet sign-in routes
 */
export function createAuthRoutes(auth: WalletAuth): Router {
  const router = Router();

  /**
   * GET /auth/nonce?address=0x...
   * Challenge for the wallet to sign, naming the role it will sign in as
   */
  router.get("/nonce", (req: Request, res: Response) => {
    const address = req.query.address;
    if (typeof address !== "string" || !address) {
      res.status(400).json({ error: "Missing address parameter", code: "MISSING_ADDRESS" });
      return;
    }

    try {
      const { nonce, message, role, expiresAt } = auth.challenge(address);
      res.json({ nonce, message, role, expiresAt });
    } catch (err) {
      sendAuthError(res, err);
    }
  });

  /**
   * POST /auth/verify
   * Body: { address, nonce, signature }
   */
  router.post("/verify", async (req: Request, res: Response) => {
    const address = readField(req.body, "address");
    const nonce = readField(req.body, "nonce");
    const signature = readField(req.body, "signature");

    if (!address || !nonce || !signature) {
      res.status(400).json({
        error: "Missing required fields: address, nonce, signature",
        code: "MISSING_FIELDS",
      });
      return;
    }

    try {
      const { token, expiresAt, caller } = await auth.signIn(address, nonce, signature);
      res.json({ token, expiresAt, address: caller.address, role: caller.role });
    } catch (err) {
      sendAuthError(res, err);
    }
  });

  /**
   * GET /auth/session
   * The caller behind the bearer token
   */
  router.get("/session", requireCaller(auth), (req: CallerRequest, res: Response) => {
    res.json({ caller: req.caller ?? null });
  });

  return router;
}
