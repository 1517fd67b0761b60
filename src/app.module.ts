/**
 * @fileoverview Application Root Module
 *
 * Configures the NestJS application with logging, metrics, and feature modules.
 */

import { Module } from '@nestjs/common';
import { APP_FILTER, APP_GUARD } from '@nestjs/core';
import { LoggerModule } from 'nestjs-pino';
import { PrometheusModule } from '@willsoto/nestjs-prometheus';
import { ConfigModule } from './config/config.module';
import { SharedAuthModule } from './shared/auth';
import { SharedClockModule } from './shared/clock';
import { SharedDynamoDbModule } from './shared/dynamodb';
import { PersistenceExceptionFilter, RateLimitGuard } from './shared/http';
import { AuditModule } from './audit/audit.module';
import { MembershipModule } from './membership';
import { IdentityModule } from './identity';
import { JobsModule } from './jobs';
import { HealthModule } from './health/health.module';

const isProduction = process.env.NODE_ENV === 'production';
const isTest = process.env.NODE_ENV === 'test';

@Module({
    imports: [
        // Logging
        LoggerModule.forRoot({
            pinoHttp: {
                level: isTest ? 'silent' : isProduction ? 'info' : 'debug',
                transport: isProduction || isTest
                    ? undefined // JSON output for CloudWatch
                    : {
                        targets: [
                            {
                                target: 'pino-pretty',
                                level: 'debug',
                                options: { colorize: true },
                            },
                            {
                                target: 'pino-loki',
                                level: 'info',
                                options: {
                                    host: process.env.LOKI_HOST || 'http://localhost:3100',
                                    labels: { app: 'member-directory-api' },
                                    batching: true,
                                    interval: 5,
                                },
                            },
                        ],
                    },
                redact: [
                    'req.headers.authorization',
                    'req.body.password',
                    'req.body.currentPassword',
                    'req.body.newPassword',
                    'req.body.refreshToken',
                    'res.headers["set-cookie"]',
                ],
            },
        }),

        // Metrics
        PrometheusModule.register({
            path: '/metrics',
            defaultMetrics: { enabled: !isTest },
        }),

        // Shared modules
        ConfigModule,
        SharedClockModule,
        SharedDynamoDbModule,
        SharedAuthModule,
        AuditModule,

        // Feature modules
        MembershipModule,
        IdentityModule,
        JobsModule,
        HealthModule,
    ],
    providers: [
        { provide: APP_FILTER, useClass: PersistenceExceptionFilter },
        { provide: APP_GUARD, useClass: RateLimitGuard },
    ],
})
export class AppModule { }
