/**
 * Request Logging Middleware
 *
 * Logs every request with method, path, status, and timing.
 */

import type { MiddlewareHandler } from 'hono';
import type { Logger } from '../logger.js';

/**
 * Log entry fields for one request
 */
export interface RequestLogFields {
  method: string;
  path: string;
  status: number;
  duration_ms: number;
}

/**
 * Request logger middleware
 *
 * @example
 * ```ts
 * app.use('*', requestLogger(logger));
 * ```
 */
export function requestLogger(logger: Logger): MiddlewareHandler {
  const log = logger.child({ component: 'http' });

  return async (c, next) => {
    const startTime = performance.now();

    await next();

    const fields: RequestLogFields = {
      method: c.req.method,
      path: c.req.path,
      status: c.res.status,
      duration_ms: Math.round((performance.now() - startTime) * 100) / 100, // Round to 2 decimal places
    };

    if (fields.status >= 500) {
      log.error('http.request', { ...fields });
    } else {
      log.info('http.request', { ...fields });
    }
  };
}

