export type RandomSource = () => number

/**
 * Fisher-Yates shuffle into a new array. `random` must return values in [0, 1).
 */
export function shuffle<T>(items: readonly T[], random: RandomSource = Math.random): T[] {
  const result = [...items]
  for (let i = result.length - 1; i > 0; i--) {
    const j = Math.floor(random() * (i + 1))
    ;[result[i], result[j]] = [result[j], result[i]]
  }
  return result
}

export function sample<T>(items: readonly T[], limit: number, random?: RandomSource): T[] {
  return shuffle(items, random).slice(0, Math.max(0, limit))
}
