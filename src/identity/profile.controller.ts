/**
 * @fileoverview Profile Controller
 *
 * @remarks
 * Endpoints (JWT required):
 * - POST /profile/change-password - Signs out every session on success
 */

import { Body, Controller, HttpCode, HttpStatus, Post, Request, UseGuards } from '@nestjs/common';
import { AuthGuard } from '@nestjs/passport';
import { ApiBearerAuth, ApiOperation, ApiResponse, ApiTags } from '@nestjs/swagger';
import { unwrapOrThrow } from '../pipeline';
import { AuthenticatedRequest, authenticatedUserOf, requestContextOf } from '../shared/http';
import { AuthService } from './auth.service';
import { ChangePasswordDto, PasswordChangedDto } from './dto';

@ApiTags('profile')
@ApiBearerAuth()
@UseGuards(AuthGuard('jwt'))
@Controller('profile')
export class ProfileController {
    constructor(private authService: AuthService) { }

    @Post('change-password')
    @HttpCode(HttpStatus.OK)
    @ApiOperation({ summary: 'Change the caller\'s password' })
    @ApiResponse({ status: 200, type: PasswordChangedDto })
    @ApiResponse({ status: 400, description: 'Weak new password, wrong current password or unchanged password' })
    async changePassword(
        @Body() body: ChangePasswordDto,
        @Request() req: AuthenticatedRequest,
    ): Promise<PasswordChangedDto> {
        unwrapOrThrow(await this.authService.changePassword(authenticatedUserOf(req), body, requestContextOf(req)));
        return {
            message: 'Password changed successfully. Please log in again with your new password.',
            logoutRequired: true,
        };
    }
}
