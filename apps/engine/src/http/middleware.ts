import { NextFunction, Request, Response } from 'express';
import { v4 as uuid } from 'uuid';
import { createLogger } from '../logger';

const logger = createLogger('http');

/**
 * Tag each request with an id, echoed back in X-Request-Id
 */
export function requestIdMiddleware(req: Request, res: Response, next: NextFunction): void {
    const incoming = req.header('x-request-id');
    const requestId = incoming && incoming.length <= 128 ? incoming : uuid();
    res.locals.requestId = requestId;
    res.setHeader('X-Request-Id', requestId);
    next();
}

/**
 * Log method, path, status and duration once the response is sent
 */
export function timingMiddleware(req: Request, res: Response, next: NextFunction): void {
    const startedAt = Date.now();
    res.on('finish', () => {
        logger.info('Request completed', {
            requestId: res.locals.requestId,
            method: req.method,
            path: req.path,
            status: res.statusCode,
            durationMs: Date.now() - startedAt,
        });
    });
    next();
}
