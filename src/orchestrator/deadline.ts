import { RemoteModelError, toRemoteModelError } from '../errors';

/**
 * Run `run` under a hard deadline. The signal handed to `run` aborts when
 * the deadline passes or the parent signal aborts; the returned promise
 * rejects at that moment even if `run` ignores its signal.
 */
export async function withDeadline<T>(
  run: (signal: AbortSignal) => Promise<T>,
  timeoutMs: number,
  parent?: AbortSignal,
): Promise<T> {
  const controller = new AbortController();
  const onParentAbort = () => controller.abort(new RemoteModelError('failed', 'Request aborted by caller'));
  const timer = setTimeout(
    () => controller.abort(new RemoteModelError('timeout', `No answer within ${timeoutMs} ms`)),
    timeoutMs,
  );

  if (parent?.aborted) onParentAbort();
  else parent?.addEventListener('abort', onParentAbort, { once: true });

  const stopped = new Promise<never>((_, reject) => {
    const fail = () => reject(toRemoteModelError(controller.signal.reason));
    if (controller.signal.aborted) fail();
    else controller.signal.addEventListener('abort', fail, { once: true });
  });

  try {
    return await Promise.race([run(controller.signal), stopped]);
  } finally {
    clearTimeout(timer);
    parent?.removeEventListener('abort', onParentAbort);
  }
}
