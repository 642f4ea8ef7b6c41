import rateLimit from "express-rate-limit";

/**
 * Rate limiter for inbound webhooks (Wasender, helpdesk, VK)
 * Lenient: these carry legitimate bursts from the networks
 */
export const webhookLimiter = rateLimit({
  windowMs: 1 * 60 * 1000, // 1 minute
  max: 300,
  message: {
    error: "Webhook rate limit exceeded.",
  },
  standardHeaders: true,
  legacyHeaders: false,
});

/**
 * Rate limiter for the manual dispatch endpoint
 */
export const dispatchLimiter = rateLimit({
  windowMs: 1 * 60 * 1000, // 1 minute
  max: 30,
  message: {
    error: "Too many dispatch requests. Please slow down.",
  },
  standardHeaders: true,
  legacyHeaders: false,
});
