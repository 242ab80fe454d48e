import type { RequestHandler } from 'express';
import type { Logger } from 'pino';
import { v4 as uuidv4 } from 'uuid';

export const REQUEST_ID_HEADER = 'X-Request-Id';
const MAX_REQUEST_ID_LENGTH = 128;

declare global {
  namespace Express {
    interface Locals {
      requestId: string;
      log: Logger;
      /** Fires when the client goes away before the response is written */
      signal: AbortSignal;
    }
  }
}

/**
 * Per-request id, child logger and cancellation signal, stored on
 * `res.locals` for the handlers that follow.
 */
export function requestContext(logger: Logger): RequestHandler {
  return (req, res, next) => {
    const incoming = req.get(REQUEST_ID_HEADER);
    const requestId =
      incoming && incoming.length <= MAX_REQUEST_ID_LENGTH ? incoming : uuidv4();

    const controller = new AbortController();
    res.on('close', () => {
      if (!res.writableFinished) controller.abort();
    });

    const log = logger.child({ requestId });
    res.locals.requestId = requestId;
    res.locals.log = log;
    res.locals.signal = controller.signal;
    res.setHeader(REQUEST_ID_HEADER, requestId);

    const startedAt = Date.now();
    res.on('finish', () => {
      log.info(
        {
          method: req.method,
          path: req.originalUrl,
          status: res.statusCode,
          durationMs: Date.now() - startedAt,
        },
        'Request completed'
      );
    });

    next();
  };
}
