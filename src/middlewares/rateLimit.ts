import rateLimit from 'express-rate-limit';
import * as functions from 'firebase-functions';

/**
 * General API rate limiter
 * 300 requests per 15 minutes per IP; summary screens poll often
 */
export const apiLimiter = rateLimit({
  windowMs: 15 * 60 * 1000,
  limit: 300,
  standardHeaders: true,
  legacyHeaders: false,
  handler: (req, res) => {
    functions.logger.warn(`[rate-limit] IP ${req.ip} exceeded general rate limit`);
    res.status(429).json({
      code: 'rate_limit_exceeded',
      message: 'Too many requests, please try again later.',
    });
  },
});

/**
 * Limiter for quick-log and queue drains, which fan out into many writes
 * 10 requests per 15 minutes per IP
 */
export const bulkWriteLimiter = rateLimit({
  windowMs: 15 * 60 * 1000,
  limit: 10,
  standardHeaders: true,
  legacyHeaders: false,
  handler: (req, res) => {
    functions.logger.warn(`[rate-limit] IP ${req.ip} exceeded bulk write rate limit`);
    res.status(429).json({
      code: 'rate_limit_exceeded',
      message: 'Too many bulk write requests, please try again later.',
    });
  },
});
