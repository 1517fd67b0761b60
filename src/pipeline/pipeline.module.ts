/**
 * @fileoverview Pipeline Module
 *
 * Validation, uniqueness, authorization and assembly stages plus the
 * orchestrator that runs them. Imported by every vertical with mutating
 * endpoints.
 */

import { Module } from '@nestjs/common';
import { AuditModule } from '../audit/audit.module';
import { FieldValidator } from './validation/field-validator';
import { UniquenessChecker } from './uniqueness/uniqueness-checker';
import { PermissionEvaluator } from './authorization/permission-evaluator';
import { EntityAssembler } from './assembly/entity-assembler';
import { RequestPipeline } from './request-pipeline.service';

@Module({
    imports: [AuditModule],
    providers: [FieldValidator, UniquenessChecker, PermissionEvaluator, EntityAssembler, RequestPipeline],
    exports: [FieldValidator, PermissionEvaluator, EntityAssembler, RequestPipeline],
})
export class PipelineModule { }
