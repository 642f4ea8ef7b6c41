import { Router, Request, Response, NextFunction } from "express";
import type { OutboundRouter } from "../routing/outbound-router";
import { asyncHandler } from "../middleware/error-handler";
import { validateBody } from "../middleware/validate";
import { dispatchLimiter } from "../middleware/rate-limit";
import { dispatchSchema } from "../schemas/webhooks";
import { ForbiddenError, UnauthorizedError } from "../utils/errors";

export interface DispatchRouterDeps {
  token: string;
  router: OutboundRouter;
}

/**
 * Bearer token check for the manual dispatch endpoint
 */
export function requireDispatchToken(token: string) {
  return (req: Request, _res: Response, next: NextFunction) => {
    const authorization = req.header("Authorization");
    if (!authorization || !authorization.startsWith("Bearer ")) {
      next(new UnauthorizedError("Authorization: Bearer <token> header is required"));
      return;
    }
    if (authorization.slice("Bearer ".length).trim() !== token) {
      next(new ForbiddenError("Invalid token"));
      return;
    }
    next();
  };
}

/**
 * Manual dispatch: send a text to any Telegram user, with a typing
 * indicator shown first.
 */
export function createDispatchRouter({ token, router: outbound }: DispatchRouterDeps): Router {
  const router = Router();

  router.post(
    "/dispatch",
    dispatchLimiter,
    requireDispatchToken(token),
    validateBody(dispatchSchema),
    asyncHandler(async (req, res) => {
      const body = dispatchSchema.parse(req.body);
      await outbound.dispatchDirect({
        channel: "telegram",
        recipientId: body.recipient_id,
        text: body.text,
        typingSeconds: body.typing_seconds,
        accessHash: body.access_hash,
      });
      res.json({ status: "ok", recipient_id: body.recipient_id });
    })
  );

  return router;
}
