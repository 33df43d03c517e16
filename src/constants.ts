/**
 * Global constants for dialfetch
 * Centralizes magic numbers and configuration defaults
 */

// Dialing
export const DEFAULT_DIAL_TIMEOUT_MS = 500;
export const DEFAULT_MAX_CACHED_SESSIONS = 100;

// Pooling
export const DEFAULT_KEEP_ALIVE_TIMEOUT_MS = 4 * 1000;
export const DEFAULT_KEEP_ALIVE_MAX_TIMEOUT_MS = 10 * 60 * 1000; // 10 minutes
export const DEFAULT_HTTP1_PIPELINING = 1;

// Response deadlines (undici defaults)
export const DEFAULT_HEADERS_TIMEOUT_MS = 300 * 1000;
export const DEFAULT_BODY_TIMEOUT_MS = 300 * 1000;

// Ports used when the URL carries none
export const DEFAULT_PORTS: Readonly<Record<string, string>> = Object.freeze({
  http: '80',
  https: '443',
});
