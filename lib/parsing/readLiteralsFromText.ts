/**
 * Splits a file of literals into tokens. `*` lines are comments, as in a
 * netlist, and `;` starts a comment running to the end of the line.
 */
function readLiteralsFromText(text: string) {
  const out: string[] = []
  for (const raw of text.split(/\r?\n/)) {
    let line = raw.trim()
    if (!line) continue
    if (/^\*/.test(line)) continue
    line = line.replace(/;.*$/, "")
    out.push(...line.split(/\s+/).filter((token) => token.length > 0))
  }
  return out
}

export { readLiteralsFromText }
