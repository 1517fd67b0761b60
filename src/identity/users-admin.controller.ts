/**
 * @fileoverview User Administration Controller
 *
 * @remarks
 * Reads are gated by user:read. Mutations go through the pipeline, which
 * checks user:update or user:delete after validation.
 */

import {
    Body,
    Controller,
    Delete,
    Get,
    HttpCode,
    HttpStatus,
    Param,
    Post,
    Put,
    Query,
    Request,
    UseGuards,
    ValidationPipe,
} from '@nestjs/common';
import { AuthGuard } from '@nestjs/passport';
import { ApiBearerAuth, ApiOperation, ApiTags } from '@nestjs/swagger';
import { unwrapOrThrow } from '../pipeline';
import { PermissionsGuard, RequirePermissions } from '../shared/auth';
import { AuthenticatedRequest, requestContextOf } from '../shared/http';
import { clampPageSize, Page, PageQueryDto } from '../shared/pagination';
import { RoleIdsDto } from './dto';
import { UserView } from './interfaces';
import { UsersAdminService } from './users-admin.service';

@ApiTags('admin')
@ApiBearerAuth()
@Controller('admin/users')
@UseGuards(AuthGuard('jwt'), PermissionsGuard)
export class UsersAdminController {
    constructor(private usersAdminService: UsersAdminService) { }

    @Get()
    @RequirePermissions('user:read')
    @ApiOperation({ summary: 'List users' })
    async list(@Query(new ValidationPipe({ transform: true })) query: PageQueryDto): Promise<Page<UserView>> {
        return this.usersAdminService.listUsers(query.page ?? 0, clampPageSize(query.size));
    }

    @Get(':id')
    @RequirePermissions('user:read')
    @ApiOperation({ summary: 'Get a user by id' })
    async findOne(@Param('id') id: string): Promise<UserView> {
        return this.usersAdminService.getUser(id);
    }

    @Post(':id/enable')
    @HttpCode(HttpStatus.OK)
    @ApiOperation({ summary: 'Enable an account' })
    async enable(@Param('id') id: string, @Request() req: AuthenticatedRequest): Promise<UserView> {
        return unwrapOrThrow(await this.usersAdminService.enableUser(id, requestContextOf(req)));
    }

    @Post(':id/disable')
    @HttpCode(HttpStatus.OK)
    @ApiOperation({ summary: 'Disable an account' })
    async disable(@Param('id') id: string, @Request() req: AuthenticatedRequest): Promise<UserView> {
        return unwrapOrThrow(await this.usersAdminService.disableUser(id, requestContextOf(req)));
    }

    @Post(':id/unlock')
    @HttpCode(HttpStatus.OK)
    @ApiOperation({ summary: 'Clear a login lockout' })
    async unlock(@Param('id') id: string, @Request() req: AuthenticatedRequest): Promise<UserView> {
        return unwrapOrThrow(await this.usersAdminService.unlockUser(id, requestContextOf(req)));
    }

    @Put(':id/roles')
    @ApiOperation({ summary: 'Add roles to a user' })
    async assignRoles(
        @Param('id') id: string,
        @Body() body: RoleIdsDto,
        @Request() req: AuthenticatedRequest,
    ): Promise<UserView> {
        return unwrapOrThrow(await this.usersAdminService.assignRoles(id, body, requestContextOf(req)));
    }

    @Delete(':id/roles')
    @ApiOperation({ summary: 'Remove roles from a user' })
    async removeRoles(
        @Param('id') id: string,
        @Body() body: RoleIdsDto,
        @Request() req: AuthenticatedRequest,
    ): Promise<UserView> {
        return unwrapOrThrow(await this.usersAdminService.removeRoles(id, body, requestContextOf(req)));
    }

    @Delete(':id')
    @HttpCode(HttpStatus.NO_CONTENT)
    @ApiOperation({ summary: 'Delete a user' })
    async remove(@Param('id') id: string, @Request() req: AuthenticatedRequest): Promise<void> {
        unwrapOrThrow(await this.usersAdminService.deleteUser(id, requestContextOf(req)));
    }
}
