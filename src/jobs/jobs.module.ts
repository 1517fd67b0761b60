/**
 * @fileoverview Jobs Module
 */

import { Module } from '@nestjs/common';
import { MembershipModule } from '../membership/membership.module';
import { SharedAuthModule } from '../shared/auth';
import { JOB_STORE } from './interfaces';
import { JobsController } from './jobs.controller';
import { JobsRepository } from './jobs.repository';
import { JobsService } from './jobs.service';
import { MemberBulkController } from './member-bulk.controller';

@Module({
    imports: [SharedAuthModule, MembershipModule],
    controllers: [JobsController, MemberBulkController],
    providers: [
        JobsRepository,
        { provide: JOB_STORE, useExisting: JobsRepository },
        JobsService,
    ],
    exports: [JobsService],
})
export class JobsModule { }
