/**
 * @fileoverview Role Administration Controller
 *
 * @remarks
 * Reads are gated by role:read. Mutations go through the pipeline, which
 * checks role:create, role:update or role:delete after validation.
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
    Request,
    UseGuards,
} from '@nestjs/common';
import { AuthGuard } from '@nestjs/passport';
import { ApiBearerAuth, ApiOperation, ApiTags } from '@nestjs/swagger';
import { unwrapOrThrow } from '../pipeline';
import { PermissionsGuard, RequirePermissions } from '../shared/auth';
import { AuthenticatedRequest, requestContextOf } from '../shared/http';
import { RoleRequestDto } from './dto';
import { Role } from './interfaces';
import { RolesService } from './roles.service';

@ApiTags('admin')
@ApiBearerAuth()
@Controller('admin/roles')
@UseGuards(AuthGuard('jwt'), PermissionsGuard)
export class RolesController {
    constructor(private rolesService: RolesService) { }

    @Get()
    @RequirePermissions('role:read')
    @ApiOperation({ summary: 'List roles' })
    async list(): Promise<Role[]> {
        return this.rolesService.listRoles();
    }

    @Get('permissions')
    @RequirePermissions('role:read')
    @ApiOperation({ summary: 'List every permission token' })
    permissions(): string[] {
        return this.rolesService.listPermissions();
    }

    @Get(':id')
    @RequirePermissions('role:read')
    @ApiOperation({ summary: 'Get a role by id' })
    async findOne(@Param('id') id: string): Promise<Role> {
        return this.rolesService.getRole(id);
    }

    @Post()
    @ApiOperation({ summary: 'Create a role' })
    async create(@Body() body: RoleRequestDto, @Request() req: AuthenticatedRequest): Promise<Role> {
        return unwrapOrThrow(await this.rolesService.createRole(body, requestContextOf(req)));
    }

    @Put(':id')
    @ApiOperation({ summary: 'Update name, description or permissions of a role' })
    async update(
        @Param('id') id: string,
        @Body() body: RoleRequestDto,
        @Request() req: AuthenticatedRequest,
    ): Promise<Role> {
        return unwrapOrThrow(await this.rolesService.updateRole(id, body, requestContextOf(req)));
    }

    @Delete(':id')
    @HttpCode(HttpStatus.NO_CONTENT)
    @ApiOperation({ summary: 'Delete a role' })
    async remove(@Param('id') id: string, @Request() req: AuthenticatedRequest): Promise<void> {
        unwrapOrThrow(await this.rolesService.deleteRole(id, requestContextOf(req)));
    }
}
