/**
 * @fileoverview OpenTelemetry Tracing Setup
 *
 * Auto-instrumentation with OTLP export (Jaeger locally).
 * This file MUST be imported before any other imports in main.ts.
 *
 * @remarks
 * Settings come from {@link tracingOptionsFrom}; with tracing disabled the SDK
 * is never started.
 */

import { NodeSDK } from '@opentelemetry/sdk-node';
import { getNodeAutoInstrumentations } from '@opentelemetry/auto-instrumentations-node';
import { OTLPTraceExporter } from '@opentelemetry/exporter-trace-otlp-http';
import { Resource } from '@opentelemetry/resources';
import { SemanticResourceAttributes } from '@opentelemetry/semantic-conventions';
import { AlwaysOnSampler, ParentBasedSampler, Sampler, TraceIdRatioBasedSampler } from '@opentelemetry/sdk-trace-node';
import { isUntracedPath, TracingOptions, tracingOptionsFrom } from './tracing-options';

function samplerFor(options: TracingOptions): Sampler {
    return options.sampleRatio >= 1
        ? new AlwaysOnSampler()
        : new ParentBasedSampler({ root: new TraceIdRatioBasedSampler(options.sampleRatio) });
}

function createSdk(options: TracingOptions): NodeSDK {
    return new NodeSDK({
        resource: new Resource({
            [SemanticResourceAttributes.SERVICE_NAME]: 'member-directory-api',
            [SemanticResourceAttributes.SERVICE_VERSION]: '1.0.0',
            [SemanticResourceAttributes.DEPLOYMENT_ENVIRONMENT]: options.environment,
        }),
        traceExporter: new OTLPTraceExporter({ url: options.endpoint }),
        sampler: samplerFor(options),
        instrumentations: [
            getNodeAutoInstrumentations({
                // Disable noisy instrumentations
                '@opentelemetry/instrumentation-fs': { enabled: false },
                '@opentelemetry/instrumentation-dns': { enabled: false },
                '@opentelemetry/instrumentation-http': {
                    ignoreIncomingRequestHook: (request) => isUntracedPath(request.url),
                },
            }),
        ],
    });
}

const options = tracingOptionsFrom(process.env);

export const sdk: NodeSDK | null = options.enabled ? createSdk(options) : null;

if (sdk) {
    sdk.start();

    // Flush spans on SIGTERM; the application's own shutdown hooks end the process
    process.once('SIGTERM', () => {
        sdk.shutdown()
            .then(() => console.log('Tracing terminated'))
            .catch((error: Error) => console.error('Error terminating tracing', error));
    });
}
