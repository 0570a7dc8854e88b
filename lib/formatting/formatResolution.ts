import { resolveNumber } from "../parsing/resolveNumber"

type ResolutionRecord =
  | { raw: string; value: number }
  | { raw: string; error: string }

function toResolutionRecord(text: string): ResolutionRecord {
  const result = resolveNumber(text)
  if (!result.ok) return { raw: text, error: result.error.message }
  return { raw: result.number.raw, value: result.number.value }
}

function formatResolutionRecord(record: ResolutionRecord) {
  if ("error" in record) return `${record.raw}\terror: ${record.error}`
  return `${record.raw}\t${record.value}`
}

function formatResolution(text: string) {
  return formatResolutionRecord(toResolutionRecord(text))
}

export { formatResolution, formatResolutionRecord, toResolutionRecord }
export type { ResolutionRecord }
