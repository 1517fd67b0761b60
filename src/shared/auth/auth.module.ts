/**
 * @fileoverview Shared Auth Module
 *
 * Passport setup and the permission guard used by all verticals. The JWT
 * strategy itself is provided by the identity module, which owns the
 * principal resolver it depends on.
 */

import { Module } from '@nestjs/common';
import { PassportModule } from '@nestjs/passport';
import { PipelineModule } from '../../pipeline/pipeline.module';
import { PermissionsGuard } from './permissions.guard';

@Module({
    imports: [PassportModule.register({ defaultStrategy: 'jwt' }), PipelineModule],
    providers: [PermissionsGuard],
    exports: [PassportModule, PermissionsGuard, PipelineModule],
})
export class SharedAuthModule { }
