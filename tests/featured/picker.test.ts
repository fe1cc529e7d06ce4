import { describe, it, expect } from 'vitest'
import { InvalidArgumentError } from '@/lib/errors'
import { selectRandomVideos } from '@/lib/featured/picker'
import { SeededRandom } from '@/lib/featured/random'
import { ScriptedRandom } from '../helpers'

const range = (n: number) => Array.from({ length: n }, (_, i) => i)

describe('selectRandomVideos', () => {
  it('always starts with the first pool entry', () => {
    const random = new SeededRandom(7)
    for (let size = 1; size <= 8; size++) {
      const pool = range(size)
      for (let count = 1; count <= size; count++) {
        expect(selectRandomVideos(random, pool, count)[0]).toBe(0)
      }
    }
  })

  it('returns exactly count distinct positions from the rest of the pool', () => {
    const random = new SeededRandom(99)
    const pool = range(12)
    for (let i = 0; i < 200; i++) {
      const count = 1 + (i % 12)
      const selected = selectRandomVideos(random, pool, count)
      expect(selected).toHaveLength(count)
      expect(new Set(selected).size).toBe(count)
      for (const value of selected.slice(1)) {
        expect(value).toBeGreaterThanOrEqual(1)
        expect(value).toBeLessThan(12)
      }
    }
  })

  it('draws the second entry from the three after the first', () => {
    const random = new SeededRandom(123)
    const items = [0, 1, 2, 3, 4, 5, 6, 7, 9, 10]
    const seenSecond = new Set<number>()

    for (let i = 0; i < 1000; i++) {
      const selected = selectRandomVideos(random, items, 4)

      expect(selected[0]).toBe(0)
      expect(selected[1]).toBeGreaterThan(0)
      expect(selected[1]).toBeLessThan(4)
      expect(new Set(selected).size).toBe(selected.length)
      seenSecond.add(selected[1])
    }
    expect([...seenSecond].sort((a, b) => a - b)).toEqual([1, 2, 3])
  })

  it('keeps draws in the order they were made', () => {
    const random = new ScriptedRandom([2, 0, 1])
    const selected = selectRandomVideos(random, ['a', 'b', 'c', 'd', 'e'], 4)

    expect(selected).toEqual(['a', 'd', 'b', 'e'])
    expect(random.calls).toEqual([
      [0, 3],
      [0, 3],
      [0, 2],
    ])
  })

  it('bounds the second draw by the remaining entries in a short pool', () => {
    const random = new ScriptedRandom([1])
    expect(selectRandomVideos(random, ['a', 'b', 'c'], 2)).toEqual(['a', 'c'])
    expect(random.calls).toEqual([[0, 2]])
  })

  it('honours a custom recent window', () => {
    const random = new SeededRandom(5)
    for (let i = 0; i < 100; i++) {
      expect(selectRandomVideos(random, range(10), 3, { recentWindow: 1 })[1]).toBe(1)
    }
  })

  it('returns a permutation when the whole pool is requested', () => {
    const selected = selectRandomVideos(new SeededRandom(11), range(6), 6)
    expect(selected[0]).toBe(0)
    expect([...selected].sort()).toEqual(range(6))
  })

  it('is reproducible for a fixed seed', () => {
    const a = new SeededRandom(42)
    const b = new SeededRandom(42)
    for (let i = 0; i < 50; i++) {
      expect(selectRandomVideos(a, range(10), 4)).toEqual(selectRandomVideos(b, range(10), 4))
    }
  })

  it('keeps duplicate pool values when their positions differ', () => {
    const selected = selectRandomVideos(new SeededRandom(3), ['x', 'x', 'y'], 3)
    expect([...selected].sort()).toEqual(['x', 'x', 'y'])
  })

  it('does not modify the pool', () => {
    const pool = range(5)
    selectRandomVideos(new SeededRandom(1), pool, 5)
    expect(pool).toEqual([0, 1, 2, 3, 4])
  })

  it('rejects an empty pool', () => {
    expect(() => selectRandomVideos(new SeededRandom(1), [], 1)).toThrow(InvalidArgumentError)
  })

  it('rejects counts outside [1, pool size]', () => {
    const random = new SeededRandom(1)
    expect(() => selectRandomVideos(random, range(3), 0)).toThrow(InvalidArgumentError)
    expect(() => selectRandomVideos(random, range(3), -1)).toThrow(InvalidArgumentError)
    expect(() => selectRandomVideos(random, range(3), 1.5)).toThrow(InvalidArgumentError)
    expect(() => selectRandomVideos(random, range(3), 4)).toThrow('count 4 exceeds pool size 3')
    expect(() => selectRandomVideos(random, ['only'], 2)).toThrow(InvalidArgumentError)
  })

  it('rejects a recent window below one', () => {
    expect(() => selectRandomVideos(new SeededRandom(1), range(3), 2, { recentWindow: 0 })).toThrow(
      InvalidArgumentError,
    )
  })
})
