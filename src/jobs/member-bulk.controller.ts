/**
 * @fileoverview Member Bulk Controller
 *
 * Bulk member operations that run as background jobs. Both endpoints answer
 * 202 with the job id; progress is read from /jobs/:id.
 */

import {
    Body,
    Controller,
    HttpCode,
    HttpStatus,
    Post,
    Request,
    UseGuards,
    ValidationPipe,
} from '@nestjs/common';
import { AuthGuard } from '@nestjs/passport';
import { ApiBearerAuth, ApiOperation, ApiResponse, ApiTags } from '@nestjs/swagger';
import { PermissionsGuard, RequirePermissions } from '../shared/auth';
import { AuthenticatedRequest, authenticatedUserOf, clientIpOf } from '../shared/http';
import { BulkDeleteDto, JobAcceptedDto, MemberImportDto } from './dto';
import { Job } from './interfaces';
import { JobsService } from './jobs.service';

function accepted(job: Job): JobAcceptedDto {
    return {
        jobId: job.id,
        status: job.status,
        totalItems: job.totalItems,
        message: `Poll /jobs/${job.id} for status`,
    };
}

@ApiTags('members')
@ApiBearerAuth()
@Controller('members')
@UseGuards(AuthGuard('jwt'), PermissionsGuard)
export class MemberBulkController {
    constructor(private jobsService: JobsService) { }

    @Post('bulk-delete')
    @HttpCode(HttpStatus.ACCEPTED)
    @RequirePermissions('member:delete')
    @ApiOperation({ summary: 'Delete members in the background' })
    @ApiResponse({ status: 202, type: JobAcceptedDto })
    async bulkDelete(
        @Body(new ValidationPipe()) body: BulkDeleteDto,
        @Request() req: AuthenticatedRequest,
    ): Promise<JobAcceptedDto> {
        const job = await this.jobsService.startBulkDelete(body.memberIds, authenticatedUserOf(req), clientIpOf(req));
        return accepted(job);
    }

    @Post('import')
    @HttpCode(HttpStatus.ACCEPTED)
    @RequirePermissions('member:create')
    @ApiOperation({ summary: 'Import members in the background', description: 'One job for all rows' })
    @ApiResponse({ status: 202, type: JobAcceptedDto })
    async import(
        @Body(new ValidationPipe({ transform: true })) body: MemberImportDto,
        @Request() req: AuthenticatedRequest,
    ): Promise<JobAcceptedDto> {
        const job = await this.jobsService.startImport(body.rows, authenticatedUserOf(req), clientIpOf(req));
        return accepted(job);
    }
}
