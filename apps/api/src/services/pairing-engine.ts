/**
 * Pairing engine.
 *
 * Pure functions over an immutable roster + directed rating snapshot. Nothing
 * here touches storage; callers load a fresh snapshot per computation.
 *
 * Candidate pairs are always enumerated in one fixed total order: people
 * sorted by UTF-16 code unit, then `(people[i], people[j])` for `i < j` in
 * row-major order. The first candidate with a strictly better score wins,
 * which keeps results identical for identical input regardless of the order
 * the roster was handed in.
 */

import type { PairRecord, PairingResults, PairingStrategy } from '@pairup/schema'
import { PAIRING_ERROR_CODES, PairingError } from '../lib/errors.js'

export const COMPATIBILITY_ROUND_DIGITS = 2

/** Upper bound for the bitmask search; 2^16 memo entries. */
export const EXACT_STRATEGY_MAX_PEOPLE = 16

/** from → (to → score). Missing entries score 0. */
export type RatingMatrix = ReadonlyMap<string, ReadonlyMap<string, number>>

export type PairingSnapshot = {
  readonly people: readonly string[]
  readonly ratings: RatingMatrix
}

export type PairingDraft = {
  pairs: PairRecord[]
  unpaired: string | null
}

export type PairingStrategyFn = (people: readonly string[], ratings: RatingMatrix) => PairingDraft

export type DirectedRatingRow = {
  fromUsername: string
  toUsername: string
  score: number
}

export function toRatingMatrix(rows: Iterable<DirectedRatingRow>): RatingMatrix {
  const matrix = new Map<string, Map<string, number>>()
  for (const row of rows) {
    let targets = matrix.get(row.fromUsername)
    if (!targets) {
      targets = new Map()
      matrix.set(row.fromUsername, targets)
    }
    targets.set(row.toUsername, row.score)
  }
  return matrix
}

export function directedScore(ratings: RatingMatrix, from: string, to: string): number {
  return ratings.get(from)?.get(to) ?? 0
}

export function mutualScore(ratings: RatingMatrix, a: string, b: string): number {
  return (directedScore(ratings, a, b) + directedScore(ratings, b, a)) / 2
}

export function compareCodeUnits(a: string, b: string): number {
  if (a < b) return -1
  if (a > b) return 1
  return 0
}

function orderedPeople(people: readonly string[]): string[] {
  return [...new Set(people)].sort(compareCodeUnits)
}

function toPairRecord(ratings: RatingMatrix, a: string, b: string, score: number): PairRecord {
  return {
    pair: [a, b],
    compatibility: round(score),
    ratings: {
      [a]: directedScore(ratings, a, b),
      [b]: directedScore(ratings, b, a),
    },
  }
}

/**
 * Repeated arg-max: pick the best remaining pair, remove both, repeat until
 * fewer than two people are left. O(n³); a strong early pick can force a
 * weaker overall matching and that is accepted behavior.
 */
export function findGreedyPairs(people: readonly string[], ratings: RatingMatrix): PairingDraft {
  let available = orderedPeople(people)
  const pairs: PairRecord[] = []

  while (available.length >= 2) {
    let best: [string, string] | null = null
    let bestScore = -1

    for (let i = 0; i < available.length; i += 1) {
      for (let j = i + 1; j < available.length; j += 1) {
        const a = available[i]
        const b = available[j]
        const score = mutualScore(ratings, a, b)
        if (score > bestScore) {
          bestScore = score
          best = [a, b]
        }
      }
    }

    if (best === null) {
      break
    }

    const [a, b] = best
    pairs.push(toPairRecord(ratings, a, b, bestScore))
    available = available.filter((person) => person !== a && person !== b)
  }

  return { pairs, unpaired: available[0] ?? null }
}

type ExactChoice = {
  total: number
  /** Index paired with the lowest remaining person; null leaves that person unpaired. */
  partner: number | null
}

function popcount(mask: number): number {
  let count = 0
  let rest = mask
  while (rest !== 0) {
    rest &= rest - 1
    count += 1
  }
  return count
}

function lowestBit(mask: number): number {
  let index = 0
  while ((mask & (1 << index)) === 0) {
    index += 1
  }
  return index
}

/**
 * Maximum total mutual score over all matchings, leaving exactly one person
 * out when the roster is odd. Opt-in only (`strategy=exact`).
 */
export function findExactPairs(people: readonly string[], ratings: RatingMatrix): PairingDraft {
  const ordered = orderedPeople(people)
  const n = ordered.length

  if (n > EXACT_STRATEGY_MAX_PEOPLE) {
    throw new PairingError(
      PAIRING_ERROR_CODES.INVALID_INPUT,
      `The exact strategy supports at most ${EXACT_STRATEGY_MAX_PEOPLE} people`,
      { details: { people: n, max: EXACT_STRATEGY_MAX_PEOPLE } },
    )
  }

  const scores = ordered.map((a, i) => ordered.map((b, j) => (i === j ? 0 : mutualScore(ratings, a, b))))
  const memo = new Map<number, ExactChoice>()

  const solve = (mask: number): number => {
    if (mask === 0) {
      return 0
    }
    const cached = memo.get(mask)
    if (cached) {
      return cached.total
    }

    const i = lowestBit(mask)
    const rest = mask & ~(1 << i)
    let best: ExactChoice | null = null

    for (let j = i + 1; j < n; j += 1) {
      if ((rest & (1 << j)) === 0) {
        continue
      }
      const total = scores[i][j] + solve(rest & ~(1 << j))
      if (best === null || total > best.total) {
        best = { total, partner: j }
      }
    }

    if (popcount(mask) % 2 === 1) {
      const total = solve(rest)
      if (best === null || total > best.total) {
        best = { total, partner: null }
      }
    }

    const choice = best ?? { total: 0, partner: null }
    memo.set(mask, choice)
    return choice.total
  }

  const fullMask = n === 0 ? 0 : (1 << n) - 1
  solve(fullMask)

  const pairs: PairRecord[] = []
  let unpaired: string | null = null
  let mask = fullMask

  while (mask !== 0) {
    const i = lowestBit(mask)
    const choice = memo.get(mask)
    if (!choice || choice.partner === null) {
      unpaired = ordered[i]
      mask &= ~(1 << i)
      continue
    }
    const j = choice.partner
    pairs.push(toPairRecord(ratings, ordered[i], ordered[j], scores[i][j]))
    mask &= ~((1 << i) | (1 << j))
  }

  return { pairs, unpaired }
}

export const PAIRING_STRATEGIES: Record<PairingStrategy, PairingStrategyFn> = {
  greedy: findGreedyPairs,
  exact: findExactPairs,
}

export function computePairingResults(
  snapshot: PairingSnapshot,
  options: { strategy?: PairingStrategy } = {},
): PairingResults {
  const strategy = options.strategy ?? 'greedy'
  const { pairs, unpaired } = PAIRING_STRATEGIES[strategy](snapshot.people, snapshot.ratings)

  const rawTotal = pairs.reduce((sum, record) => sum + record.compatibility, 0)
  const totalCompatibility = round(rawTotal)
  const averageCompatibility = pairs.length > 0 ? round(rawTotal / pairs.length) : 0

  return {
    strategy,
    pairs,
    unpaired,
    totalCompatibility,
    averageCompatibility,
    numPairs: pairs.length,
  }
}

function round(value: number): number {
  const multiplier = 10 ** COMPATIBILITY_ROUND_DIGITS
  return Math.round(value * multiplier) / multiplier
}
