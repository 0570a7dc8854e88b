const unitMul = {
  T: 1e12,
  G: 1e9,
  X: 1e6,
  K: 1e3,
  U: 1e-6,
  N: 1e-9,
  P: 1e-12,
  F: 1e-15,
} as const

const MEG = 1e6
const MILLI = 1e-3

/**
 * Multiplier for a magnitude suffix letter, or null when the letter is not
 * one. `lookahead` is only read for "m", where "meg" (any case) means mega
 * and anything shorter or different means milli.
 */
function magnitudeOfSuffix(letter: string, lookahead = ""): number | null {
  const key = letter.toUpperCase()
  if (key === "M") return lookahead.toUpperCase() === "EG" ? MEG : MILLI
  if (key in unitMul) return unitMul[key as keyof typeof unitMul]
  return null
}

export { magnitudeOfSuffix }
