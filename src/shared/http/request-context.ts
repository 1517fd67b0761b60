/**
 * @fileoverview Request context extraction
 */

import { UnauthorizedException } from '@nestjs/common';
import type { Request } from 'express';
import type { RequestContext } from '../../pipeline/request-pipeline.service';
import type { AuthenticatedUser } from '../auth/interfaces';

export type AuthenticatedRequest = Request & { user?: AuthenticatedUser };

/**
 * Client address, preferring the first X-Forwarded-For hop set by the load balancer.
 */
export function clientIpOf(req: Request): string | null {
    const forwarded = req.headers['x-forwarded-for'];
    const first = Array.isArray(forwarded) ? forwarded[0] : forwarded;
    if (first) {
        const hop = first.split(',')[0].trim();
        if (hop) return hop;
    }
    return req.ip ?? req.socket?.remoteAddress ?? null;
}

export function requestContextOf(req: AuthenticatedRequest): RequestContext {
    return {
        principal: req.user ?? null,
        ipAddress: clientIpOf(req),
    };
}

/**
 * The user attached by the JWT guard. Throws when a handler is reached
 * without one.
 */
export function authenticatedUserOf(req: AuthenticatedRequest): AuthenticatedUser {
    if (!req.user) {
        throw new UnauthorizedException();
    }
    return req.user;
}
