/**
 * @fileoverview Auth Controller
 *
 * @remarks
 * Endpoints:
 * - POST /auth/register - Public self-service registration
 * - POST /auth/login    - Public; 401 on bad credentials, 423 while locked
 * - POST /auth/refresh  - Public; rotates the refresh token
 * - POST /auth/logout   - Revokes the presented token and its session
 * - POST /auth/logout-all - Ends every session of the caller
 * - GET  /auth/me       - Current principal with roles and permissions
 */

import {
    Body,
    Controller,
    Get,
    HttpCode,
    HttpStatus,
    Post,
    Request,
    UseGuards,
    ValidationPipe,
} from '@nestjs/common';
import { AuthGuard } from '@nestjs/passport';
import { ApiBearerAuth, ApiOperation, ApiResponse, ApiTags } from '@nestjs/swagger';
import { unwrapOrThrow } from '../pipeline';
import { AuthenticatedRequest, authenticatedUserOf, requestContextOf } from '../shared/http';
import { AuthService } from './auth.service';
import {
    AuthResponseDto,
    LoginDto,
    LogoutAllResponseDto,
    PrincipalSummaryDto,
    RefreshTokenDto,
    RegisterUserDto,
} from './dto';
import { UserView } from './interfaces';

@ApiTags('auth')
@Controller('auth')
export class AuthController {
    constructor(private authService: AuthService) { }

    @Post('register')
    @ApiOperation({ summary: 'Register a user account' })
    @ApiResponse({ status: 201, description: 'Account created with the USER role' })
    @ApiResponse({ status: 409, description: 'Username or email already exists' })
    async register(@Body() body: RegisterUserDto, @Request() req: AuthenticatedRequest): Promise<UserView> {
        return unwrapOrThrow(await this.authService.registerUser(body, requestContextOf(req)));
    }

    @Post('login')
    @HttpCode(HttpStatus.OK)
    @ApiOperation({ summary: 'Exchange credentials for an access token' })
    @ApiResponse({ status: 401, description: 'Invalid credentials or disabled account' })
    @ApiResponse({ status: 423, description: 'Account locked after repeated failures' })
    async login(
        @Body(new ValidationPipe()) body: LoginDto,
        @Request() req: AuthenticatedRequest,
    ): Promise<AuthResponseDto> {
        return this.authService.login(body, requestContextOf(req), req.headers['user-agent']);
    }

    @Post('refresh')
    @HttpCode(HttpStatus.OK)
    @ApiOperation({ summary: 'Exchange a refresh token for new tokens' })
    @ApiResponse({ status: 401, description: 'Unknown, expired, revoked or already used refresh token' })
    async refresh(
        @Body(new ValidationPipe()) body: RefreshTokenDto,
        @Request() req: AuthenticatedRequest,
    ): Promise<AuthResponseDto> {
        return this.authService.refresh(body.refreshToken, requestContextOf(req));
    }

    @Post('logout')
    @HttpCode(HttpStatus.NO_CONTENT)
    @UseGuards(AuthGuard('jwt'))
    @ApiBearerAuth()
    @ApiOperation({ summary: 'Revoke the current access token' })
    async logout(@Request() req: AuthenticatedRequest): Promise<void> {
        await this.authService.logout(authenticatedUserOf(req), requestContextOf(req));
    }

    @Post('logout-all')
    @HttpCode(HttpStatus.OK)
    @UseGuards(AuthGuard('jwt'))
    @ApiBearerAuth()
    @ApiOperation({ summary: 'End every session on every device' })
    @ApiResponse({ status: 200, type: LogoutAllResponseDto })
    async logoutAll(@Request() req: AuthenticatedRequest): Promise<LogoutAllResponseDto> {
        return this.authService.logoutAll(authenticatedUserOf(req), requestContextOf(req));
    }

    @Get('me')
    @UseGuards(AuthGuard('jwt'))
    @ApiBearerAuth()
    @ApiOperation({ summary: 'Current principal' })
    me(@Request() req: AuthenticatedRequest): PrincipalSummaryDto {
        return this.authService.me(authenticatedUserOf(req));
    }
}
