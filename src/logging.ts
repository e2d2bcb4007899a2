// src/logging.ts

/**
 * Timestamped console logging: [2025-01-10T09:30:00.000Z] message
 */
export function log(message: string): void {
    console.log(`[${new Date().toISOString()}] ${message}`);
}

export function logError(message: string, err?: unknown): void {
    const detail = err instanceof Error ? `: ${err.message}` : '';
    console.error(`[${new Date().toISOString()}] ${message}${detail}`);
}
