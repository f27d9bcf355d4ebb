/**
 * Callback contexts
 *
 * A context decides where completion and progress callbacks run. Contexts
 * must run tasks in the order they were scheduled.
 */

export interface CallbackContext {
  schedule(task: () => void): void;
}

/** Runs callbacks from the check phase of the event loop (the default) */
export const immediateContext: CallbackContext = {
  schedule(task) {
    setImmediate(task);
  },
};

/** Runs callbacks as microtasks, as soon as the current job finishes */
export const microtaskContext: CallbackContext = {
  schedule(task) {
    queueMicrotask(task);
  },
};

/**
 * `undefined` selects the default context; `null` leaves the choice
 * unspecified, which currently means a microtask.
 */
export function resolveContext(context: CallbackContext | null | undefined): CallbackContext {
  if (context === undefined) {
    return immediateContext;
  }
  return context ?? microtaskContext;
}
