/**
 * Security Middleware
 *
 * Security headers for every response and the content-type gate for the
 * messaging endpoint.
 */

import type { Request, Response, NextFunction } from 'express';
import { UnsupportedMediaTypeError } from '../utils/errorHandler';

/**
 * Security headers middleware.
 * The service only returns JSON or empty bodies, so nothing may be framed,
 * sniffed or loaded from it.
 */
export function addSecurityHeaders(_req: Request, res: Response, next: NextFunction) {
    // Prevent clickjacking
    res.setHeader('X-Frame-Options', 'DENY');

    // Prevent MIME type sniffing
    res.setHeader('X-Content-Type-Options', 'nosniff');

    res.setHeader('Referrer-Policy', 'no-referrer');
    res.setHeader('Content-Security-Policy', "default-src 'none'; frame-ancestors 'none'");

    next();
}

/**
 * Rejects requests whose Content-Type is not JSON with 415.
 */
export function requireJsonContent(req: Request, _res: Response, next: NextFunction) {
    const contentType = req.get('Content-Type');
    if (!contentType || !contentType.toLowerCase().includes('application/json')) {
        return next(new UnsupportedMediaTypeError(contentType));
    }
    next();
}
