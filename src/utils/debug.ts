/**
 * Debug logging for LineCalc
 *
 * Enabled by LINECALC_DEBUG=true in the environment or programmatically via setDebug().
 */

let debugEnabled: boolean = (() => {
    try {
        return globalThis.process?.env?.LINECALC_DEBUG === 'true';
    } catch {
        return false;
    }
})();

export function setDebug(enabled: boolean): void {
    debugEnabled = enabled;
}

export function isDebugEnabled(): boolean {
    return debugEnabled;
}

/**
 * Log a debug line as `[scope] [timestamp] message`
 */
export function debugLog(scope: string, message: string, details?: Record<string, unknown>): void {
    if (!debugEnabled) {
        return;
    }
    const timestamp = new Date().toISOString();
    if (details) {
        console.log(`[${scope}] [${timestamp}] ${message}`, details);
    } else {
        console.log(`[${scope}] [${timestamp}] ${message}`);
    }
}
