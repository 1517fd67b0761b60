/**
 * @fileoverview Pipeline Barrel Export
 */

export * from './pipeline.module';
export * from './request-pipeline.service';
export * from './pipeline-error';
export * from './pipeline-http';
export * from './result';
export * from './validation/field-rules';
export * from './validation/field-validator';
export * from './uniqueness/uniqueness-checker';
export * from './authorization/permission';
export * from './authorization/permission-evaluator';
export * from './assembly/entity-assembler';
