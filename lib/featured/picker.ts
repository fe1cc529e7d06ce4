import { InvalidArgumentError } from '@/lib/errors'
import type { RandomSource } from './random'

export const DEFAULT_RECENT_WINDOW = 3

export type SelectOptions = {
  /** How many entries after the first one the second slot is drawn from. */
  recentWindow?: number
}

/**
 * Picks `count` entries of `source`: the first entry always, then one of the
 * next `recentWindow` entries, then uniformly from whatever is left. Draw order
 * is kept in the output.
 */
export function selectRandomVideos<T>(
  random: RandomSource,
  source: readonly T[],
  count: number,
  options: SelectOptions = {},
): T[] {
  const recentWindow = options.recentWindow ?? DEFAULT_RECENT_WINDOW
  if (!source.length) throw new InvalidArgumentError('cannot select from an empty pool')
  if (!Number.isInteger(count) || count < 1) {
    throw new InvalidArgumentError(`count must be a positive integer, got ${count}`)
  }
  if (count > source.length) {
    throw new InvalidArgumentError(`count ${count} exceeds pool size ${source.length}`)
  }
  if (!Number.isInteger(recentWindow) || recentWindow < 1) {
    throw new InvalidArgumentError(`recentWindow must be a positive integer, got ${recentWindow}`)
  }

  const selected: T[] = [source[0]]
  // ascending, so the first draw can be bounded to the most recent entries
  const available = Array.from({ length: source.length - 1 }, (_, i) => i + 1)

  while (selected.length < count) {
    const bound = selected.length === 1 ? Math.min(recentWindow, available.length) : available.length
    const [position] = available.splice(random.nextInt(0, bound), 1)
    selected.push(source[position])
  }
  return selected
}
