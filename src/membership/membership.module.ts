/**
 * @fileoverview Membership Module
 *
 * Member directory: repository, service and HTTP surface.
 */

import { Module } from '@nestjs/common';
import { SharedAuthModule } from '../shared/auth';
import { MEMBER_STORE } from './interfaces';
import { MembershipController } from './membership.controller';
import { MembershipRepository } from './membership.repository';
import { MembershipService } from './membership.service';

@Module({
    imports: [SharedAuthModule],
    controllers: [MembershipController],
    providers: [
        MembershipRepository,
        { provide: MEMBER_STORE, useExisting: MembershipRepository },
        MembershipService,
    ],
    exports: [MembershipService],
})
export class MembershipModule { }
