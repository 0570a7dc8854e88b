/**
 * A numeric value from a SPICE file together with the text it was read from.
 *
 * Comparison only looks at `value`, so `1k` and `1000` are equal. `raw` is
 * kept for writing the literal back out the way it was spelled.
 */
class SpiceNumber {
  readonly value: number
  readonly raw: string

  constructor(value: number, raw: string) {
    this.value = value
    this.raw = raw
  }

  static default() {
    return new SpiceNumber(0, "0")
  }

  equals(other: SpiceNumber) {
    return this.value === other.value
  }

  /** Negative, zero or positive like a sort comparator; NaN when unordered. */
  compare(other: SpiceNumber) {
    if (this.value < other.value) return -1
    if (this.value > other.value) return 1
    if (this.value === other.value) return 0
    return NaN
  }

  toString() {
    return this.raw
  }

  valueOf() {
    return this.value
  }
}

function compareSpiceNumbers(a: SpiceNumber, b: SpiceNumber) {
  return a.compare(b)
}

export { SpiceNumber, compareSpiceNumbers }
