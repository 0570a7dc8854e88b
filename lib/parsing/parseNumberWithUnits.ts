import { resolveNumber } from "./resolveNumber"

/**
 * Value of a netlist token, or NaN when the token is missing or not a number.
 * Surrounding whitespace is ignored.
 */
function parseNumberWithUnits(raw: unknown) {
  if (raw == null) return NaN
  const s = String(raw).trim()
  if (s === "") return NaN
  const result = resolveNumber(s)
  return result.ok ? result.number.value : NaN
}

export { parseNumberWithUnits }
