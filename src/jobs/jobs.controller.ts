/**
 * @fileoverview Jobs Controller
 *
 * Status polling and control for the caller's own background jobs.
 *
 * @remarks
 * Endpoints:
 * - GET    /jobs            - All jobs, newest first
 * - GET    /jobs/active     - PENDING and IN_PROGRESS jobs
 * - GET    /jobs/:id        - One job with its item results
 * - POST   /jobs/:id/cancel - Cancel an active job
 * - DELETE /jobs/:id        - Remove a finished job from history
 */

import {
    Controller,
    Delete,
    Get,
    HttpCode,
    HttpStatus,
    Param,
    Post,
    Request,
    UseGuards,
} from '@nestjs/common';
import { AuthGuard } from '@nestjs/passport';
import { ApiBearerAuth, ApiOperation, ApiResponse, ApiTags } from '@nestjs/swagger';
import { AuthenticatedRequest, authenticatedUserOf } from '../shared/http';
import { Job } from './interfaces';
import { JobsService } from './jobs.service';

@ApiTags('jobs')
@ApiBearerAuth()
@Controller('jobs')
@UseGuards(AuthGuard('jwt'))
export class JobsController {
    constructor(private jobsService: JobsService) { }

    @Get()
    @ApiOperation({ summary: 'List my jobs' })
    async list(@Request() req: AuthenticatedRequest): Promise<Job[]> {
        return this.jobsService.listJobs(authenticatedUserOf(req).userId);
    }

    @Get('active')
    @ApiOperation({ summary: 'List my active jobs' })
    async active(@Request() req: AuthenticatedRequest): Promise<Job[]> {
        return this.jobsService.listActiveJobs(authenticatedUserOf(req).userId);
    }

    @Get(':id')
    @ApiOperation({ summary: 'Get job status' })
    @ApiResponse({ status: 403, description: 'Job belongs to another user' })
    @ApiResponse({ status: 404, description: 'Job not found' })
    async findOne(@Param('id') id: string, @Request() req: AuthenticatedRequest): Promise<Job> {
        return this.jobsService.getJob(id, authenticatedUserOf(req).userId);
    }

    @Post(':id/cancel')
    @HttpCode(HttpStatus.OK)
    @ApiOperation({ summary: 'Cancel a job' })
    @ApiResponse({ status: 409, description: 'Job already finished' })
    async cancel(@Param('id') id: string, @Request() req: AuthenticatedRequest): Promise<Job> {
        return this.jobsService.cancelJob(id, authenticatedUserOf(req).userId);
    }

    @Delete(':id')
    @HttpCode(HttpStatus.NO_CONTENT)
    @ApiOperation({ summary: 'Delete a finished job' })
    @ApiResponse({ status: 409, description: 'Job still running' })
    async remove(@Param('id') id: string, @Request() req: AuthenticatedRequest): Promise<void> {
        await this.jobsService.deleteJob(id, authenticatedUserOf(req).userId);
    }
}
