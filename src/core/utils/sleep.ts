/**
 * Resolves after `ms`, or as soon as the signal aborts. Never rejects.
 * Returns true when the full delay elapsed.
 */
export function sleep(ms: number, signal?: AbortSignal): Promise<boolean> {
  if (signal?.aborted) {
    return Promise.resolve(false)
  }
  if (ms <= 0) {
    return Promise.resolve(true)
  }

  return new Promise<boolean>((resolve) => {
    const onAbort = () => {
      clearTimeout(timer)
      resolve(false)
    }

    const timer = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort)
      resolve(true)
    }, ms)

    signal?.addEventListener('abort', onAbort, { once: true })
  })
}
