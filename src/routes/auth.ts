/**
 * Authentication Routes
 * Exchanges the single configured credential for a bearer token.
 */

import { Router } from "express";
import { z } from "zod";
import { asyncHandler } from "../middleware/asyncHandler";
import {
  AuthConfig,
  authMiddleware,
  createToken,
  requireSession,
  SessionRevocations,
} from "../middleware/auth";
import { sendError, sendSuccess } from "../middleware/responseHelper";
import { PendingMealStore } from "../services/pendingMeals";
import { ConfigurationError } from "../utils/errors";
import { verifyPassword } from "../utils/password";

const loginSchema = z.object({
  username: z.string().trim().min(1),
  password: z.string().min(1),
});

export function createAuthRouter(
  auth: AuthConfig | null,
  pendingMeals: PendingMealStore,
  revokedSessions: SessionRevocations
): Router {
  const router = Router();

  /**
   * POST /api/v1/auth/login
   * Body: { username, password }
   * Returns: { token, tokenType, expiresAt, username }
   */
  router.post(
    "/login",
    asyncHandler(async (req, res) => {
      if (!auth) {
        throw new ConfigurationError("Authentication not configured");
      }

      const { username, password } = loginSchema.parse(req.body);

      // Hash check runs even for a wrong username so both cases take as long.
      const passwordOk = verifyPassword(password, auth.passwordHash);
      if (username !== auth.username || !passwordOk) {
        console.warn(`[auth] Failed login for "${username}"`);
        return sendError(res, "Invalid username or password", 401);
      }

      const { token, payload } = createToken(auth.username, auth.tokenSecret, auth.tokenTtl);
      console.log(`[auth] Login for ${payload.sub}, session ${payload.sid}`);

      return sendSuccess(res, {
        token,
        tokenType: "Bearer",
        expiresAt: new Date(payload.exp * 1000).toISOString(),
        username: payload.sub,
      });
    })
  );

  /**
   * POST /api/v1/auth/logout
   * Ends the session and drops its pending meal.
   */
  router.post("/logout", authMiddleware(auth, revokedSessions), (req, res) => {
    const session = requireSession(req);
    pendingMeals.clear(session.sid);
    revokedSessions.revoke(session);
    return sendSuccess(res, { loggedOut: true });
  });

  return router;
}
