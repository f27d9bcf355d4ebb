/**
 * Calling conventions
 *
 * makeRequest / makeDownloadRequest return immediately and deliver the
 * outcome to a callback exactly once. request / download are built on top
 * of them: they wait on a one-shot handoff and resolve with the value or
 * reject with the RequestError.
 */

import type {
  EmptyEndpoint,
  Endpoint,
  InEndpoint,
  InOutEndpoint,
  OutEndpoint,
} from '../api/endpoints';
import { hasOutput } from '../api/endpoints';
import { createConfigurationError } from '../api/errors';
import { failure, removeTemporaryFile } from '../response/interpreter';
import type { Outcome } from '../response/interpreter';
import { getDefaultService } from '../service/service';
import type { Service } from '../service/types';
import { resolveContext } from './context';
import type { CallbackContext } from './context';
import { executeDownload, executeRequest, toRequestError } from './execute';
import { OneShot } from './one-shot';
import { createProgressReporter } from './progress';
import type { ProgressHandler, ProgressReporter } from './progress';

// ============ Options ============

export interface AwaitOptions {
  /** Defaults to the registered default service */
  service?: Service;
  onProgress?: ProgressHandler;
}

export interface CallbackOptions<T> extends AwaitOptions {
  /**
   * Where onProgress and onComplete run. Omitted: immediateContext.
   * null: an unspecified context.
   */
  callbackContext?: CallbackContext | null;
  onComplete: (outcome: Outcome<T>) => void;
}

export interface InputOption<I> {
  input: I;
}

type DispatchOptions<T> = CallbackOptions<T> & { input?: unknown };

// ============ Dispatch ============

function resolveService(service: Service | undefined): Service {
  return service ?? getDefaultService();
}

function scheduleCompletion<T>(
  context: CallbackContext,
  reporter: ProgressReporter,
  deliver: (outcome: Outcome<T>) => void
): (outcome: Outcome<T>) => void {
  let completed = false;
  return (outcome) => {
    if (completed) {
      return;
    }
    completed = true;
    reporter.close();
    context.schedule(() => {
      reporter.finish();
      deliver(outcome);
    });
  };
}

function dispatchRequest(endpoint: Endpoint, options: DispatchOptions<unknown>): void {
  const context = resolveContext(options.callbackContext);
  const reporter = createProgressReporter(options.onProgress, context);
  const complete = scheduleCompletion(context, reporter, options.onComplete);

  let service: Service;
  try {
    service = resolveService(options.service);
  } catch (error) {
    complete(failure(toRequestError(error)));
    return;
  }

  void executeRequest(endpoint, service, {
    input: options.input,
    onProgress: (event) => reporter.report(event),
  }).then(complete, (error: unknown) => complete(failure(toRequestError(error))));
}

/**
 * The callback form removes the file once onComplete returns; the awaited
 * form hands the file over to the caller.
 */
function dispatchDownload(
  endpoint: Endpoint,
  options: DispatchOptions<string>,
  ownership: 'callback' | 'caller'
): void {
  const context = resolveContext(options.callbackContext);
  const reporter = createProgressReporter(options.onProgress, context);
  const complete = scheduleCompletion<string>(context, reporter, (outcome) => {
    try {
      options.onComplete(outcome);
    } finally {
      if (outcome.ok && ownership === 'callback') {
        void removeTemporaryFile(outcome.value);
      }
    }
  });

  if (!hasOutput(endpoint)) {
    complete(
      failure(createConfigurationError(`A "${endpoint.kind}" endpoint has no output to download`))
    );
    return;
  }

  let service: Service;
  try {
    service = resolveService(options.service);
  } catch (error) {
    complete(failure(toRequestError(error)));
    return;
  }

  void executeDownload(endpoint, service, {
    input: options.input,
    onProgress: (event) => reporter.report(event),
  }).then(complete, (error: unknown) => complete(failure(toRequestError(error))));
}

async function awaitOutcome<T>(start: (handoff: OneShot<Outcome<T>>) => void): Promise<T> {
  const handoff = new OneShot<Outcome<T>>();
  start(handoff);
  const outcome = await handoff.wait();
  if (!outcome.ok) {
    throw outcome.error;
  }
  return outcome.value;
}

// ============ Callback entry points ============

/**
 * Make an asynchronous request to an endpoint
 *
 * Returns immediately; onComplete runs exactly once.
 */
export function makeRequest(endpoint: EmptyEndpoint, options: CallbackOptions<void>): void;
export function makeRequest<I>(
  endpoint: InEndpoint<I>,
  options: CallbackOptions<void> & InputOption<I>
): void;
export function makeRequest<O>(endpoint: OutEndpoint<O>, options: CallbackOptions<O>): void;
export function makeRequest<I, O>(
  endpoint: InOutEndpoint<I, O>,
  options: CallbackOptions<O> & InputOption<I>
): void;
export function makeRequest(endpoint: Endpoint, options: DispatchOptions<unknown>): void;
export function makeRequest(endpoint: Endpoint, options: DispatchOptions<unknown>): void {
  dispatchRequest(endpoint, options);
}

/**
 * Make an asynchronous download request to an endpoint
 *
 * The response body is streamed to a temporary file whose path is the
 * outcome value. The file exists only until onComplete returns; move or
 * open it before returning. Endpoints without output complete with a
 * configuration error.
 */
export function makeDownloadRequest(
  endpoint: OutEndpoint<unknown>,
  options: CallbackOptions<string>
): void;
export function makeDownloadRequest<I>(
  endpoint: InOutEndpoint<I, unknown>,
  options: CallbackOptions<string> & InputOption<I>
): void;
export function makeDownloadRequest(endpoint: Endpoint, options: DispatchOptions<string>): void;
export function makeDownloadRequest(endpoint: Endpoint, options: DispatchOptions<string>): void {
  dispatchDownload(endpoint, options, 'callback');
}

// ============ Awaited entry points ============

/**
 * Make a request and wait for its outcome
 *
 * @returns the endpoint's decoded output
 * @throws RequestError
 */
export function request(endpoint: EmptyEndpoint, options?: AwaitOptions): Promise<void>;
export function request<I>(endpoint: InEndpoint<I>, options: AwaitOptions & InputOption<I>): Promise<void>;
export function request<O>(endpoint: OutEndpoint<O>, options?: AwaitOptions): Promise<O>;
export function request<I, O>(
  endpoint: InOutEndpoint<I, O>,
  options: AwaitOptions & InputOption<I>
): Promise<O>;
export function request(endpoint: Endpoint, options?: AwaitOptions & { input?: unknown }): Promise<unknown>;
export function request(
  endpoint: Endpoint,
  options: AwaitOptions & { input?: unknown } = {}
): Promise<unknown> {
  return awaitOutcome<unknown>((handoff) =>
    dispatchRequest(endpoint, {
      ...options,
      callbackContext: null,
      onComplete: (outcome) => handoff.fire(outcome),
    })
  );
}

/**
 * Download an endpoint's response body and wait for it
 *
 * @returns path of the downloaded file, now owned by the caller
 * @throws RequestError
 */
export function download(endpoint: OutEndpoint<unknown>, options?: AwaitOptions): Promise<string>;
export function download<I>(
  endpoint: InOutEndpoint<I, unknown>,
  options: AwaitOptions & InputOption<I>
): Promise<string>;
export function download(endpoint: Endpoint, options?: AwaitOptions & { input?: unknown }): Promise<string>;
export function download(
  endpoint: Endpoint,
  options: AwaitOptions & { input?: unknown } = {}
): Promise<string> {
  return awaitOutcome<string>((handoff) =>
    dispatchDownload(
      endpoint,
      {
        ...options,
        callbackContext: null,
        onComplete: (outcome) => handoff.fire(outcome),
      },
      'caller'
    )
  );
}
