/**
 * @fileoverview Pipeline Error to HTTP mapping
 *
 * | Terminal state          | Status |
 * |-------------------------|--------|
 * | VALIDATION_FAILED       | 400    |
 * | PRECONDITION_FAILED     | 400    |
 * | FORBIDDEN               | 403    |
 * | NOT_FOUND               | 404    |
 * | CONFLICT                | 409    |
 * | PERSIST_FAILED          | 500    |
 * | DEPENDENCY_UNAVAILABLE  | 503    |
 */

import {
    BadRequestException,
    ConflictException,
    ForbiddenException,
    HttpException,
    InternalServerErrorException,
    NotFoundException,
    ServiceUnavailableException,
} from '@nestjs/common';
import { PipelineError } from './pipeline-error';
import { Result } from './result';

/** Human label for a field name in conflict messages */
const FIELD_LABELS: Record<string, string> = {
    email: 'Email',
    username: 'Username',
    name: 'Name',
};

export function toHttpException(error: PipelineError): HttpException {
    switch (error.kind) {
        case 'VALIDATION_FAILED':
            return new BadRequestException({
                statusCode: 400,
                message: 'Validation failed',
                errors: error.fieldErrors,
            });
        case 'PRECONDITION_FAILED':
            return new BadRequestException({
                statusCode: 400,
                message: error.reason,
            });
        case 'CONFLICT':
            return new ConflictException(`${FIELD_LABELS[error.field] ?? error.field} already exists`);
        case 'FORBIDDEN':
            // Never reveal which permission was missing
            return new ForbiddenException();
        case 'NOT_FOUND':
            return new NotFoundException(`${error.entityType} not found`);
        case 'DEPENDENCY_UNAVAILABLE':
            return new ServiceUnavailableException('Service temporarily unavailable');
        case 'PERSIST_FAILED':
            return new InternalServerErrorException('Failed to persist changes');
    }
}

/**
 * Returns the value of a successful result or throws the mapped exception.
 */
export function unwrapOrThrow<T>(result: Result<T, PipelineError>): T {
    if (!result.ok) {
        throw toHttpException(result.error);
    }
    return result.value;
}
