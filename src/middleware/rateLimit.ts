// Rate limiting middleware
import rateLimit from 'express-rate-limit';

import { config } from '../config/index.js';

/**
 * Per-client request budget for the read API
 */
export const rateLimiter = rateLimit({
  windowMs: config.rateLimitWindowMs,
  limit: config.rateLimitMaxRequests,
  message: 'Too many requests, please try again later',
  standardHeaders: true,
  legacyHeaders: false
});
