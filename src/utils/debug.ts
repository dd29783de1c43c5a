/**
 * Debug tracing helpers. Tracing is on when VITE_DEBUG=true.
 */

export function isDebugEnabled(): boolean {
    return typeof process !== 'undefined' && process.env.VITE_DEBUG === 'true';
}

export function debugLog(scope: string, message: string): void {
    const timestamp = new Date().toISOString();
    console.log(`[${scope}] [${timestamp}] ${message}`);
}
