/**
 * Pull every step from an iterator, handing each to `onStep`, and return
 * the iterator's result. If `onStep` throws, the iterator is closed before
 * the error propagates, as `for...of` would do.
 */
export function drain<T, R>(steps: Iterator<T, R, undefined>, onStep: (step: T) => void): R {
  let result = steps.next()
  try {
    while (!result.done) {
      onStep(result.value)
      result = steps.next()
    }
    return result.value
  } finally {
    if (!result.done) steps.return?.()
  }
}
