/**
 * @fileoverview Sessions Controller
 *
 * @remarks
 * Endpoints (JWT required, own sessions only):
 * - GET    /sessions     - Active sessions, the current one flagged
 * - DELETE /sessions/:id - Revoke one session
 */

import { Controller, Delete, Get, Param, Request, UseGuards } from '@nestjs/common';
import { AuthGuard } from '@nestjs/passport';
import { ApiBearerAuth, ApiOperation, ApiResponse, ApiTags } from '@nestjs/swagger';
import { AuthenticatedRequest, authenticatedUserOf } from '../shared/http';
import { SessionViewDto } from './dto';
import { SessionsService } from './sessions.service';

@ApiTags('sessions')
@ApiBearerAuth()
@UseGuards(AuthGuard('jwt'))
@Controller('sessions')
export class SessionsController {
    constructor(private sessionsService: SessionsService) { }

    @Get()
    @ApiOperation({ summary: 'List active sessions' })
    @ApiResponse({ status: 200, type: [SessionViewDto] })
    async list(@Request() req: AuthenticatedRequest): Promise<SessionViewDto[]> {
        const user = authenticatedUserOf(req);
        return this.sessionsService.list(user.userId, user.tokenId);
    }

    @Delete(':id')
    @ApiOperation({ summary: 'Revoke a session' })
    @ApiResponse({ status: 404, description: 'No such session for the caller' })
    async revoke(
        @Param('id') id: string,
        @Request() req: AuthenticatedRequest,
    ): Promise<{ message: string; currentSessionRevoked: boolean }> {
        const user = authenticatedUserOf(req);
        const currentSessionRevoked = await this.sessionsService.revoke(user.userId, id, user.tokenId);
        return { message: 'Session revoked successfully', currentSessionRevoked };
    }
}
