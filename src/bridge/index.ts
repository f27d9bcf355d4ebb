/**
 * Bridge exports
 */

export { makeRequest, makeDownloadRequest, request, download } from './bridge';
export type { AwaitOptions, CallbackOptions, InputOption } from './bridge';
export { immediateContext, microtaskContext, resolveContext } from './context';
export type { CallbackContext } from './context';
export { OneShot } from './one-shot';
export { createProgressReporter, progressFraction } from './progress';
export type { ProgressHandler, ProgressReporter } from './progress';
