/**
 * Tessera Client - Signals
 * Reactive cells for page scripts, backed by @preact/signals-core
 */
import {
  signal as createSignal,
  computed as createComputed,
  effect as createEffect,
  batch as runBatch,
} from "@preact/signals-core";
import type { ReadonlySignal, Signal as PreactSignal } from "@preact/signals-core";

// Cleanups for every effect started through this module
const effectCleanups = new Set<() => void>();

/**
 * Writable reactive cell, read and written through `.value`
 */
export function state<T>(initial: T): PreactSignal<T> {
  return createSignal(initial);
}

/**
 * Derived cell; recomputes when any signal it reads changes
 */
export function computed<T>(fn: () => T): ReadonlySignal<T> {
  return createComputed(fn);
}

/**
 * Run `fn` now and again whenever a signal it read changes.
 * Returns the dispose function.
 */
export function effect(fn: () => void | (() => void)): () => void {
  const dispose = createEffect(fn);
  const cleanup = () => {
    effectCleanups.delete(cleanup);
    dispose();
  };
  effectCleanups.add(cleanup);
  return cleanup;
}

/**
 * Apply several writes, notifying subscribers once at the end
 */
export function batch<T>(fn: () => T): T {
  return runBatch(fn);
}

/**
 * Dispose every live effect (page teardown, tests)
 */
export function disposeAll(): void {
  for (const cleanup of [...effectCleanups]) {
    cleanup();
  }
}

/**
 * Number of effects that have not been disposed
 */
export function activeEffects(): number {
  return effectCleanups.size;
}
