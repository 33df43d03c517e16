import { AsyncLocalStorage } from 'node:async_hooks';

/**
 * Per-request dial settings, immutable once built.
 *
 * The override is a bare host or IP. It only changes where the socket is
 * opened, never the request's Host header or TLS identity.
 */
export interface DialScope {
  readonly override?: string;
  readonly signal?: AbortSignal;
}

export const ROOT_DIAL_SCOPE: DialScope = Object.freeze({});

const scopeStorage = new AsyncLocalStorage<DialScope>();

export function withDialOverride(scope: DialScope, address: string): DialScope {
  return Object.freeze({ ...scope, override: address });
}

export function withDialSignal(scope: DialScope, signal: AbortSignal): DialScope {
  return Object.freeze({ ...scope, signal });
}

export function readDialOverride(scope: DialScope | undefined): string | undefined {
  return scope?.override;
}

/**
 * Bind a scope to everything `fn` starts, including connection attempts
 * undici makes on its behalf.
 */
export function runInDialScope<T>(scope: DialScope, fn: () => T): T {
  return scopeStorage.run(scope, fn);
}

export function currentDialScope(): DialScope | undefined {
  return scopeStorage.getStore();
}
