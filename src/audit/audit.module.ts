/**
 * @fileoverview Audit Module
 */

import { Module } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { AuditEmitter, AUDIT_EMITTER_OPTIONS, AuditEmitterOptions } from './audit-emitter.service';
import { AuditLogRepository } from './audit-log.repository';
import { AUDIT_SINK } from './interfaces';

@Module({
    providers: [
        AuditLogRepository,
        { provide: AUDIT_SINK, useExisting: AuditLogRepository },
        {
            provide: AUDIT_EMITTER_OPTIONS,
            inject: [ConfigService],
            useFactory: (config: ConfigService): AuditEmitterOptions => ({
                capacity: config.get<number>('AUDIT_QUEUE_CAPACITY') ?? 500,
                flushTimeoutMs: config.get<number>('AUDIT_FLUSH_TIMEOUT_MS') ?? 5000,
            }),
        },
        AuditEmitter,
    ],
    exports: [AuditEmitter, AuditLogRepository, AUDIT_SINK],
})
export class AuditModule { }
