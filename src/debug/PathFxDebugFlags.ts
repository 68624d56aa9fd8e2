/**
 * PathFxDebugFlags
 *
 * Flag lookup for the path engine's console output. Browser builds read URL
 * parameters, Node reads environment variables.
 *
 * Usage:
 *   ?pathfx-debug   / PATHFX_DEBUG=1   - Log lifecycle events (init, play/stop, regeneration)
 *   ?pathfx-quiet   / PATHFX_QUIET=1   - Suppress degenerate-input warnings
 */

export interface PathFxDebugConfig {
    /** Verbose lifecycle logging */
    debug: boolean;

    /** Suppress "needs at least 2 points" warnings */
    quiet: boolean;
}

let cachedConfig: PathFxDebugConfig | null = null;

function readSearchParams(): URLSearchParams | null {
    if (typeof window === 'undefined' || !window.location) return null;
    return new URLSearchParams(window.location.search);
}

function readEnvFlag(name: string): boolean {
    if (typeof process === 'undefined' || !process.env) return false;
    const value = process.env[name];
    return value !== undefined && value !== '' && value !== '0' && value.toLowerCase() !== 'false';
}

/**
 * Resolve flags once and cache them
 */
export function getPathFxDebugConfig(): PathFxDebugConfig {
    if (cachedConfig) {
        return cachedConfig;
    }

    const params = readSearchParams();

    cachedConfig = {
        debug: (params?.has('pathfx-debug') ?? false) || readEnvFlag('PATHFX_DEBUG'),
        quiet: (params?.has('pathfx-quiet') ?? false) || readEnvFlag('PATHFX_QUIET'),
    };

    if (cachedConfig.debug) {
        console.log('[PathFxDebugFlags] Verbose path logging enabled');
    }

    return cachedConfig;
}

/**
 * Forget the cached flags (tests flip env vars between cases)
 */
export function resetPathFxDebugConfig(): void {
    cachedConfig = null;
}

/**
 * Lifecycle trace, silent unless debug is on
 */
export function debugLog(tag: string, message: string, ...details: unknown[]): void {
    if (!getPathFxDebugConfig().debug) return;
    console.log(`[${tag}] ${message}`, ...details);
}
