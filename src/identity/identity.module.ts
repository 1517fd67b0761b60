/**
 * @fileoverview Identity Module
 *
 * Users, roles, login, refresh-token sessions and the principal resolver
 * behind the JWT strategy.
 */

import { Module } from '@nestjs/common';
import { AuditModule } from '../audit/audit.module';
import { SharedAuthModule } from '../shared/auth/auth.module';
import { JwtStrategy } from '../shared/auth/jwt.strategy';
import { PRINCIPAL_RESOLVER } from '../shared/auth/interfaces';
import { AuthController } from './auth.controller';
import { AuthService } from './auth.service';
import { REVOKED_TOKEN_STORE, ROLE_STORE, SESSION_STORE, USER_STORE } from './interfaces';
import { PrincipalResolverService } from './principal-resolver.service';
import { ProfileController } from './profile.controller';
import { RevokedTokensRepository } from './revoked-tokens.repository';
import { RolesController } from './roles.controller';
import { RolesRepository } from './roles.repository';
import { RolesService } from './roles.service';
import { SessionsController } from './sessions.controller';
import { SessionsRepository } from './sessions.repository';
import { SessionsService } from './sessions.service';
import { UsersAdminController } from './users-admin.controller';
import { UsersAdminService } from './users-admin.service';
import { UsersRepository } from './users.repository';

@Module({
    imports: [SharedAuthModule, AuditModule],
    controllers: [AuthController, ProfileController, SessionsController, RolesController, UsersAdminController],
    providers: [
        UsersRepository,
        RolesRepository,
        RevokedTokensRepository,
        SessionsRepository,
        { provide: USER_STORE, useExisting: UsersRepository },
        { provide: ROLE_STORE, useExisting: RolesRepository },
        { provide: REVOKED_TOKEN_STORE, useExisting: RevokedTokensRepository },
        { provide: SESSION_STORE, useExisting: SessionsRepository },
        PrincipalResolverService,
        { provide: PRINCIPAL_RESOLVER, useExisting: PrincipalResolverService },
        JwtStrategy,
        SessionsService,
        AuthService,
        RolesService,
        UsersAdminService,
    ],
})
export class IdentityModule { }
