// OpenTelemetry must be imported FIRST before any other imports
import './shared/tracing/tracing';

import { NestFactory } from '@nestjs/core';
import { AppModule } from './app.module';
import { Logger } from 'nestjs-pino';
import { DocumentBuilder, SwaggerModule } from '@nestjs/swagger';

async function bootstrap(): Promise<void> {
    const app = await NestFactory.create(AppModule, { bufferLogs: true });

    // Use Pino logger
    const logger = app.get(Logger);
    app.useLogger(logger);

    // Flush audit entries and wait for background jobs on SIGTERM
    app.enableShutdownHooks();

    // Swagger API documentation
    const config = new DocumentBuilder()
        .setTitle('Member Directory API')
        .setDescription('Member registry with validation, uniqueness enforcement, RBAC, audit logging and background jobs')
        .setVersion('1.0')
        .addBearerAuth()
        .addTag('members', 'Member registration and lookup')
        .addTag('jobs', 'Background bulk operations')
        .addTag('auth', 'Registration, login and logout')
        .addTag('admin', 'User and role administration')
        .build();
    const document = SwaggerModule.createDocument(app, config);
    SwaggerModule.setup('api-docs', app, document);

    const port = process.env.PORT ?? 3000;
    await app.listen(port);

    logger.log(`Member Directory API listening on port ${port}, docs at /api-docs`, 'Bootstrap');
}

bootstrap().catch((error: unknown) => {
    console.error('Failed to start', error);
    process.exit(1);
});
