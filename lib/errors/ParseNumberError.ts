type ParseNumberErrorKind = "empty" | "invalid-syntax" | "invalid-multiplier"

const MESSAGES: Record<ParseNumberErrorKind, string> = {
  empty: "cannot parse number from empty string",
  "invalid-syntax": "invalid number",
  "invalid-multiplier": "invalid multiplier",
}

class ParseNumberError extends Error {
  readonly kind: ParseNumberErrorKind

  constructor(kind: ParseNumberErrorKind) {
    super(MESSAGES[kind])
    this.name = ParseNumberError.name
    this.kind = kind
  }
}

export { ParseNumberError }
export type { ParseNumberErrorKind }
