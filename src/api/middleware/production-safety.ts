/**
 * Production Safety Middleware
 * Rate limiting, CORS, request logging, error masking
 */

import rateLimit, { RateLimitRequestHandler } from 'express-rate-limit';
import { Request, Response, NextFunction } from 'express';
import { v4 as uuidv4 } from 'uuid';
import { buildErrorResponse } from '../error-response';

/**
 * Rate limiter for the uncached endpoints (refresh, simulate)
 * - every call costs a full computation, so these get a budget per IP
 */
export function createComputeRateLimiter(windowMs: number, limit: number): RateLimitRequestHandler {
  return rateLimit({
    windowMs,
    limit,
    standardHeaders: true, // Return rate limit info in the `RateLimit-*` headers
    legacyHeaders: false, // Disable the `X-RateLimit-*` headers
    message: {
      error: 'Too many refresh or simulation requests from this IP. Please try again later.',
      error_type: 'rate_limit_exceeded',
      details: {
        limit,
        window_minutes: Math.round(windowMs / 60000)
      }
    }
  });
}

/**
 * CORS for the known front-end origins
 * - credentials allowed, any method, requested headers echoed back
 * - requests from other origins get no CORS headers at all
 */
export function configureCORS(allowedOrigins: string[]) {
  const origins = new Set(allowedOrigins);

  return (req: Request, res: Response, next: NextFunction) => {
    const origin = req.headers.origin;

    if (origin && origins.has(origin)) {
      res.header('Access-Control-Allow-Origin', origin);
      res.header('Access-Control-Allow-Credentials', 'true');
      res.header('Access-Control-Allow-Methods', 'GET, POST, PUT, PATCH, DELETE, OPTIONS');
      const requestedHeaders = req.headers['access-control-request-headers'];
      res.header('Access-Control-Allow-Headers', requestedHeaders || 'Content-Type, Authorization');
      res.header('Access-Control-Max-Age', '86400'); // 24 hours
      res.vary('Origin');

      // Handle preflight
      if (req.method === 'OPTIONS') {
        res.sendStatus(204);
        return;
      }
    }

    next();
  };
}

/**
 * Structured request logger
 * - Logs all requests with timing
 */
export function requestLogger(req: Request, res: Response, next: NextFunction) {
  const start = Date.now();
  const requestId = uuidv4();

  // Add request ID to response headers
  res.setHeader('X-Request-ID', requestId);

  console.log(JSON.stringify({
    type: 'request',
    request_id: requestId,
    timestamp: new Date().toISOString(),
    method: req.method,
    path: req.path,
    ip: req.ip || req.socket.remoteAddress,
    user_agent: req.get('user-agent')
  }));

  res.on('finish', () => {
    console.log(JSON.stringify({
      type: 'response',
      request_id: requestId,
      timestamp: new Date().toISOString(),
      method: req.method,
      path: req.path,
      status: res.statusCode,
      duration_ms: Date.now() - start
    }));
  });

  next();
}

/**
 * Mask sensitive data in error messages
 */
export function maskSensitiveData(data: unknown): unknown {
  if (typeof data === 'string') {
    // Mask credentials embedded in URLs
    let masked = data.replace(/(\b[a-z][a-z0-9+.-]*:\/\/)[^/@\s]+@/gi, '$1***:***@');
    // Mask API keys
    masked = masked.replace(/([a-z_]+_api_key["\s:=]+)([a-zA-Z0-9-_]+)/gi, '$1***');
    // Mask Bearer tokens
    masked = masked.replace(/Bearer\s+[a-zA-Z0-9-_.]+/gi, 'Bearer ***');
    return masked;
  } else if (Array.isArray(data)) {
    return data.map(item => maskSensitiveData(item));
  } else if (typeof data === 'object' && data !== null) {
    const masked: Record<string, unknown> = {};
    for (const [key, value] of Object.entries(data)) {
      // Mask known sensitive keys
      if (/api[_-]?key|password|token|secret|auth/i.test(key)) {
        masked[key] = '***';
      } else {
        masked[key] = maskSensitiveData(value);
      }
    }
    return masked;
  }
  return data;
}

/**
 * Safe error logger that masks secrets
 */
export function logError(error: unknown, context?: Record<string, unknown>) {
  const errorData = {
    type: 'error',
    timestamp: new Date().toISOString(),
    error: error instanceof Error ? {
      name: error.name,
      message: maskSensitiveData(error.message),
      stack: process.env.NODE_ENV === 'development' ? error.stack : undefined
    } : maskSensitiveData(error),
    context: context ? maskSensitiveData(context) : undefined
  };

  console.error(JSON.stringify(errorData));
}

/**
 * Last-resort handler: faults raised before a route runs (malformed JSON,
 * oversized bodies) get the same structured 500 as handler errors.
 */
export function errorHandler(err: unknown, req: Request, res: Response, next: NextFunction) {
  if (res.headersSent) {
    next(err);
    return;
  }

  logError(err, { context: 'unhandled_route_error', method: req.method, path: req.path });
  const { status, body } = buildErrorResponse(err);
  res.status(status).json(body);
}
