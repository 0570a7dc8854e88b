export { resolveNumber, parseNumber } from "./parsing/resolveNumber"
export type {
  NumberLexState,
  ResolveNumberResult,
} from "./parsing/resolveNumber"
export { parseNumberWithUnits } from "./parsing/parseNumberWithUnits"
export { magnitudeOfSuffix } from "./parsing/magnitudeOfSuffix"
export { readLiteralsFromText } from "./parsing/readLiteralsFromText"
export { SpiceNumber, compareSpiceNumbers } from "./number/SpiceNumber"
export { ParseNumberError } from "./errors/ParseNumberError"
export type { ParseNumberErrorKind } from "./errors/ParseNumberError"
export {
  formatResolution,
  formatResolutionRecord,
  toResolutionRecord,
} from "./formatting/formatResolution"
export type { ResolutionRecord } from "./formatting/formatResolution"
