/**
 * Durable batched event dispatch.
 *
 * Public surface for host applications: build a dispatcher, call
 * `dispatch()` for every encoded event, and forward lifecycle changes to
 * `onForeground()` / `onBackground()`.
 */
export * from './domain/index.js';
export * from './application/index.js';
export * from './infrastructure/index.js';
export { createDispatcherFromConfig } from './bootstrap.js';
export type { BootstrapDeps } from './bootstrap.js';
