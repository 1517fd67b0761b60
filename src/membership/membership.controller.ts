/**
 * @fileoverview Membership Controller
 *
 * HTTP endpoints for the member directory.
 *
 * @remarks
 * Endpoints:
 * - POST   /members      - Register (pipeline, member:create)
 * - PUT    /members/:id  - Update (pipeline, member:update)
 * - DELETE /members/:id  - Delete (pipeline, member:delete)
 * - GET    /members      - Paged listing (member:read)
 * - GET    /members/:id  - Single member (member:read)
 *
 * Mutations sit behind the JWT guard only; the pipeline authorizes them after
 * validation. Reads are gated by {@link PermissionsGuard}.
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
import { ApiBearerAuth, ApiOperation, ApiResponse, ApiTags } from '@nestjs/swagger';
import { unwrapOrThrow } from '../pipeline';
import { PermissionsGuard, RequirePermissions } from '../shared/auth';
import { AuthenticatedRequest, requestContextOf } from '../shared/http';
import { MemberListQueryDto, MemberRequestDto } from './dto';
import { Member, MemberPage } from './interfaces';
import { MembershipService, toMemberListQuery } from './membership.service';

/* -------------------------------------------------------------------------- */
/*                              Controller Implementation                      */
/* -------------------------------------------------------------------------- */

@ApiTags('members')
@ApiBearerAuth()
@Controller('members')
@UseGuards(AuthGuard('jwt'), PermissionsGuard)
export class MembershipController {
    constructor(private membershipService: MembershipService) { }

    @Post()
    @ApiOperation({ summary: 'Register a member' })
    @ApiResponse({ status: 201, description: 'Member created' })
    @ApiResponse({ status: 400, description: 'Validation failed' })
    @ApiResponse({ status: 409, description: 'Email already exists' })
    async register(@Body() body: MemberRequestDto, @Request() req: AuthenticatedRequest): Promise<Member> {
        return unwrapOrThrow(await this.membershipService.registerMember(body, requestContextOf(req)));
    }

    @Put(':id')
    @ApiOperation({ summary: 'Update a member' })
    async update(
        @Param('id') id: string,
        @Body() body: MemberRequestDto,
        @Request() req: AuthenticatedRequest,
    ): Promise<Member> {
        return unwrapOrThrow(await this.membershipService.updateMember(id, body, requestContextOf(req)));
    }

    @Delete(':id')
    @HttpCode(HttpStatus.NO_CONTENT)
    @ApiOperation({ summary: 'Delete a member' })
    async remove(@Param('id') id: string, @Request() req: AuthenticatedRequest): Promise<void> {
        unwrapOrThrow(await this.membershipService.deleteMember(id, requestContextOf(req)));
    }

    @Get()
    @RequirePermissions('member:read')
    @ApiOperation({ summary: 'List members', description: 'Paged, sortable, searchable listing' })
    async list(
        @Query(new ValidationPipe({ transform: true })) query: MemberListQueryDto,
    ): Promise<MemberPage> {
        return this.membershipService.listMembers(toMemberListQuery(query));
    }

    @Get(':id')
    @RequirePermissions('member:read')
    @ApiOperation({ summary: 'Get a member by id' })
    async findOne(@Param('id') id: string): Promise<Member> {
        return this.membershipService.getMember(id);
    }
}
