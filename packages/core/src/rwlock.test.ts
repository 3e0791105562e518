import { describe, expect, test } from 'vitest'

import { ReadWriteLock } from './rwlock.js'

function deferred(): { promise: Promise<void>; resolve: () => void } {
  let resolve: () => void = () => {}
  const promise = new Promise<void>((r) => {
    resolve = r
  })
  return { promise, resolve }
}

/** Let every queued microtask run */
function flush(): Promise<void> {
  return new Promise((r) => setImmediate(r))
}

describe('ReadWriteLock', () => {
  test('returns the function result', async () => {
    const lock = new ReadWriteLock()
    expect(await lock.withReadLock(async () => 1)).toBe(1)
    expect(await lock.withWriteLock(async () => 2)).toBe(2)
  })

  test('readers share the lock', async () => {
    const lock = new ReadWriteLock()
    const gate = deferred()
    let active = 0
    let maxActive = 0

    const reader = () =>
      lock.withReadLock(async () => {
        active++
        maxActive = Math.max(maxActive, active)
        await gate.promise
        active--
      })

    const all = Promise.all([reader(), reader(), reader()])
    await flush()
    expect(maxActive).toBe(3)
    gate.resolve()
    await all
  })

  test('a writer waits for active readers and excludes new ones', async () => {
    const lock = new ReadWriteLock()
    const readerGate = deferred()
    const writerGate = deferred()
    const events: string[] = []

    const r1 = lock.withReadLock(async () => {
      events.push('r1 start')
      await readerGate.promise
      events.push('r1 end')
    })
    const w = lock.withWriteLock(async () => {
      events.push('w start')
      await writerGate.promise
      events.push('w end')
    })
    const r2 = lock.withReadLock(async () => {
      events.push('r2')
    })

    await flush()
    expect(events).toEqual(['r1 start'])

    readerGate.resolve()
    await flush()
    expect(events).toEqual(['r1 start', 'r1 end', 'w start'])

    writerGate.resolve()
    await Promise.all([r1, w, r2])
    expect(events).toEqual(['r1 start', 'r1 end', 'w start', 'w end', 'r2'])
  })

  test('writers run one at a time in arrival order', async () => {
    const lock = new ReadWriteLock()
    const order: number[] = []

    await Promise.all(
      [1, 2, 3].map((n) =>
        lock.withWriteLock(async () => {
          order.push(n)
          await flush()
          order.push(n)
        })
      )
    )

    expect(order).toEqual([1, 1, 2, 2, 3, 3])
  })

  test('releases the lock when the function throws', async () => {
    const lock = new ReadWriteLock()

    await expect(
      lock.withWriteLock(async () => {
        throw new Error('test error')
      })
    ).rejects.toThrow('test error')

    expect(await lock.withWriteLock(async () => 'after')).toBe('after')
  })
})
