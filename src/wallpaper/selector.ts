import { randomInt } from 'crypto'
import { NoCandidatesError } from '../errors'

export interface RandomSource {
  /** Integer in [0, bound). */
  nextIndex(bound: number): number
}

export const systemRandom: RandomSource = {
  nextIndex: (bound: number) => randomInt(bound),
}

/**
 * Candidates minus the excluded path. Falls back to every candidate when the
 * exclusion would leave nothing to pick.
 */
export function effectiveCandidates(candidates: readonly string[], excluded: string | null): readonly string[] {
  if (!excluded) return candidates

  const remaining = candidates.filter(candidate => candidate !== excluded)
  return remaining.length > 0 ? remaining : candidates
}

export function selectWallpaper(
  candidates: readonly string[],
  excluded: string | null,
  random: RandomSource = systemRandom
): string {
  const pool = effectiveCandidates(candidates, excluded)
  if (pool.length === 0) {
    throw new NoCandidatesError(null, 'select')
  }

  const index = random.nextIndex(pool.length)
  const selected = pool[index]
  if (!Number.isInteger(index) || selected === undefined) {
    throw new RangeError(`Random source returned ${index} for ${pool.length} candidates`)
  }
  return selected
}
