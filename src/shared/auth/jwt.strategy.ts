/**
 * @fileoverview JWT Authentication Strategy
 *
 * Passport.js JWT strategy for validating Bearer tokens and resolving the
 * principal behind them.
 *
 * @remarks
 * Token flow:
 * 1. Client sends Bearer token in Authorization header
 * 2. Passport verifies signature, issuer and expiry
 * 3. validate() rejects revoked tokens, then loads the user and its roles
 *    by id so role changes take effect without re-login
 * 4. The resulting AuthenticatedUser is attached to the request
 */

import { Inject, Injectable, UnauthorizedException } from '@nestjs/common';
import { PassportStrategy } from '@nestjs/passport';
import { ExtractJwt, Strategy } from 'passport-jwt';
import { ConfigService } from '@nestjs/config';
import {
    AuthenticatedUser,
    JwtPayload,
    PRINCIPAL_RESOLVER,
    PrincipalResolver,
} from './interfaces';

/** Fallback for local development only; production config requires JWT_SECRET */
export const LOCAL_DEV_SECRET = 'local-dev-secret-do-not-use-in-prod';

/** Issuer used when JWT_ISSUER is unset */
export const DEFAULT_ISSUER = 'http://localhost:3000';

@Injectable()
export class JwtStrategy extends PassportStrategy(Strategy) {
    constructor(
        configService: ConfigService,
        @Inject(PRINCIPAL_RESOLVER) private readonly resolver: PrincipalResolver,
    ) {
        super({
            jwtFromRequest: ExtractJwt.fromAuthHeaderAsBearerToken(),
            ignoreExpiration: false,
            secretOrKey: configService.get<string>('JWT_SECRET') || LOCAL_DEV_SECRET,
            issuer: configService.get<string>('JWT_ISSUER') || DEFAULT_ISSUER,
            algorithms: ['HS256'],
        });
    }

    async validate(payload: JwtPayload): Promise<AuthenticatedUser> {
        if (payload.jti && await this.resolver.isRevoked(payload.jti)) {
            throw new UnauthorizedException('Token has been revoked');
        }

        const principal = await this.resolver.resolve(payload.sub);
        if (!principal) {
            throw new UnauthorizedException();
        }

        return {
            ...principal,
            tokenId: payload.jti,
            tokenExpiresAt: payload.exp,
        };
    }
}
