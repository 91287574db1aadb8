/**
 * Debug flag shared by classes that log through console.log
 *
 * Enabled when VITE_DEBUG is 'true' in process.env (Node.js) or
 * import.meta.env (Vite).
 */
export function readDebugFlag(): boolean {
    if (typeof process !== 'undefined' && process.env?.VITE_DEBUG === 'true') {
        return true;
    }
    return import.meta.env?.VITE_DEBUG === 'true';
}

/**
 * Log a debug line prefixed with its source and a timestamp
 */
export function debugLog(source: string, message: string): void {
    const timestamp = new Date().toISOString();
    console.log(`[${source}] [${timestamp}] ${message}`);
}
