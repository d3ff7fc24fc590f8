/**
 * Resolve with the promise's value if it settles within `ms`, else null.
 * The timer is cleared as soon as the promise wins, so nothing is left
 * holding the event loop open.
 */
export function raceTimeout<T>(promise: Promise<T>, ms: number): Promise<T | null> {
  return new Promise((resolve, reject) => {
    const timer = setTimeout(() => resolve(null), ms)
    promise.then(
      (value) => {
        clearTimeout(timer)
        resolve(value)
      },
      (err: unknown) => {
        clearTimeout(timer)
        reject(err)
      }
    )
  })
}
