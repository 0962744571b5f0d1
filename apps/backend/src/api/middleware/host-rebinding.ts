import type { NextFunction, Request, RequestHandler, Response } from 'express';
import { StatusCodes } from 'http-status-codes';
import type { ILogger } from '@clusterview/types';
import { respondWithError } from '../respond.js';

/**
 * Extract the hostname from a `Host` header value.
 *
 * Strips the port, unwraps bracketed IPv6 literals and lowercases the result.
 *
 * @example
 * parseHostname('localhost:7777'); // 'localhost'
 * parseHostname('[::1]:7777');     // '::1'
 * parseHostname('::1');            // '::1'
 *
 * @returns The hostname, or `undefined` for a missing or malformed header
 */
export function parseHostname(host: string | undefined): string | undefined {
    const value = host?.trim().toLowerCase();
    if (!value) {
        return undefined;
    }

    if (value.startsWith('[')) {
        const end = value.indexOf(']');
        return end > 1 ? value.slice(1, end) : undefined;
    }

    const firstColon = value.indexOf(':');
    if (firstColon === -1) {
        return value;
    }

    // More than one colon without brackets is a bare IPv6 literal
    if (value.indexOf(':', firstColon + 1) !== -1) {
        return value;
    }

    return firstColon > 0 ? value.slice(0, firstColon) : undefined;
}

/**
 * Host-rebinding guard middleware.
 *
 * The dashboard listens on loopback. A page on a remote origin can point its
 * own hostname at 127.0.0.1 through DNS and then reach the dashboard from the
 * victim's browser; such requests still carry the attacker's hostname in the
 * `Host` header. This middleware answers every request whose hostname is not
 * on the allow-list with 403 before any router sees it.
 *
 * @param acceptedHosts - Hostnames (without port) this server answers for
 * @param logger - Logger receiving rejection records
 */
export function createHostRebindingGuard(acceptedHosts: readonly string[], logger: ILogger): RequestHandler {
    const accepted = new Set(acceptedHosts.map(host => host.toLowerCase()));

    return (req: Request, res: Response, next: NextFunction) => {
        const hostname = parseHostname(req.headers.host);

        if (hostname === undefined || !accepted.has(hostname)) {
            logger.warn({ host: req.headers.host, url: req.originalUrl }, 'rejected request for unaccepted host');
            respondWithError(res, StatusCodes.FORBIDDEN, 'forbidden', logger);
            return;
        }

        next();
    };
}
