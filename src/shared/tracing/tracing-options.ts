/**
 * @fileoverview Tracing options from the environment
 *
 * Read straight from `process.env`: tracing starts before Nest and its
 * ConfigModule exist.
 */

export interface TracingOptions {
    enabled: boolean;
    endpoint: string;
    /** Share of root traces kept, 0 to 1 */
    sampleRatio: number;
    environment: string;
}

/** Probes and scrapes that would otherwise dominate the traces */
export const UNTRACED_PATHS: readonly string[] = ['/health', '/metrics'];

const DEFAULT_ENDPOINT = 'http://localhost:4318/v1/traces';

function ratioOf(raw: string | undefined, fallback: number): number {
    if (raw === undefined || raw.trim() === '') return fallback;
    const ratio = Number(raw);
    if (!Number.isFinite(ratio)) return fallback;
    return Math.min(1, Math.max(0, ratio));
}

/**
 * Production keeps 10% of root traces unless OTEL_TRACES_SAMPLE_RATIO says
 * otherwise; every other environment keeps all of them. Tests never trace.
 */
export function tracingOptionsFrom(env: NodeJS.ProcessEnv): TracingOptions {
    const environment = env.NODE_ENV || 'development';
    return {
        enabled: environment !== 'test' && env.TRACING_ENABLED !== 'false',
        endpoint: env.OTEL_EXPORTER_OTLP_ENDPOINT || DEFAULT_ENDPOINT,
        sampleRatio: ratioOf(env.OTEL_TRACES_SAMPLE_RATIO, environment === 'production' ? 0.1 : 1),
        environment,
    };
}

export function isUntracedPath(url: string | undefined): boolean {
    const path = (url ?? '').split('?')[0];
    return UNTRACED_PATHS.includes(path);
}
