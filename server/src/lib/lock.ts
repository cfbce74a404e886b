const tails = new Map<string, Promise<void>>()

/**
 * Runs `task` after every task previously queued under the same key has settled.
 * One key per guarded resource; tasks under different keys run independently.
 */
export async function withLock<T>(key: string, task: () => Promise<T>): Promise<T> {
  const previous = tails.get(key) ?? Promise.resolve()
  let release: () => void = () => undefined
  const current = new Promise<void>((resolve) => {
    release = resolve
  })
  const tail = previous.then(() => current)
  tails.set(key, tail)

  await previous
  try {
    return await task()
  } finally {
    release()
    if (tails.get(key) === tail) {
      tails.delete(key)
    }
  }
}
