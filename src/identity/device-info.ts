/**
 * @fileoverview Device description from a User-Agent header
 *
 * Coarse "<browser> on <os>" labels for the session list. Browser tokens are
 * matched most specific first: Edge and Chrome both advertise Safari.
 */

const BROWSERS: ReadonlyArray<[token: string, label: string]> = [
    ['Edg', 'Edge'],
    ['Firefox', 'Firefox'],
    ['Chrome', 'Chrome'],
    ['Safari', 'Safari'],
];

const OPERATING_SYSTEMS: ReadonlyArray<[token: string, label: string]> = [
    ['iPhone', 'iPhone'],
    ['iPad', 'iPad'],
    ['Android', 'Android'],
    ['Windows', 'Windows'],
    ['Mac OS', 'macOS'],
    ['Macintosh', 'macOS'],
    ['Linux', 'Linux'],
];

export const UNKNOWN_DEVICE = 'Unknown Device';

function labelOf(userAgent: string, table: ReadonlyArray<[string, string]>, fallback: string): string {
    return table.find(([token]) => userAgent.includes(token))?.[1] ?? fallback;
}

export function describeDevice(userAgent: string | undefined): string {
    if (!userAgent || userAgent.trim().length === 0) {
        return UNKNOWN_DEVICE;
    }
    const browser = labelOf(userAgent, BROWSERS, 'Browser');
    const os = labelOf(userAgent, OPERATING_SYSTEMS, 'Unknown OS');
    return `${browser} on ${os}`;
}
