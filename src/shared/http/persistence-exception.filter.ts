/**
 * @fileoverview Persistence Exception Filter
 *
 * Maps storage failures that escape read endpoints (which bypass the request
 * pipeline) onto the same responses the pipeline produces.
 */

import { ArgumentsHost, Catch, ExceptionFilter, HttpStatus, Logger } from '@nestjs/common';
import type { Response } from 'express';
import { DependencyUnavailableError, EntityNotFoundError } from '../persistence';

@Catch(DependencyUnavailableError, EntityNotFoundError)
export class PersistenceExceptionFilter implements ExceptionFilter {
    private readonly logger = new Logger(PersistenceExceptionFilter.name);

    catch(exception: DependencyUnavailableError | EntityNotFoundError, host: ArgumentsHost): void {
        const response = host.switchToHttp().getResponse<Response>();

        if (exception instanceof EntityNotFoundError) {
            response.status(HttpStatus.NOT_FOUND).json({
                statusCode: HttpStatus.NOT_FOUND,
                message: `${exception.entityType} not found`,
            });
            return;
        }

        this.logger.warn({ msg: 'Dependency unavailable', dependency: exception.dependency });
        response.status(HttpStatus.SERVICE_UNAVAILABLE).json({
            statusCode: HttpStatus.SERVICE_UNAVAILABLE,
            message: 'Service temporarily unavailable',
        });
    }
}
