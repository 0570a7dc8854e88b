#!/usr/bin/env node
import {
  command,
  flag,
  option,
  optional,
  restPositionals,
  run,
  string,
} from "cmd-ts"
import { readFileSync } from "fs"
import {
  formatResolutionRecord,
  readLiteralsFromText,
  toResolutionRecord,
} from "./lib/index"

const cmd = command({
  name: "spice-literal",
  description: "Resolve SPICE numeric literals such as 1.23k or 7343Meg",
  args: {
    json: flag({
      long: "json",
      description: "Print a JSON array instead of one line per literal",
    }),
    file: option({
      long: "file",
      short: "f",
      description: "Read literals from a file (* and ; start comments)",
      type: optional(string),
    }),
    literals: restPositionals({
      description: "Literals to resolve",
      displayName: "literals",
      type: string,
    }),
  },

  handler: (args) => {
    const literals = [...args.literals]
    if (args.file) {
      literals.push(...readLiteralsFromText(readFileSync(args.file, "utf8")))
    }
    if (literals.length === 0) {
      console.error("No literals given")
      process.exitCode = 1
      return
    }

    const records = literals.map((text) => toResolutionRecord(text))
    if (args.json) {
      console.log(JSON.stringify(records, null, 2))
    } else {
      for (const record of records)
        console.log(formatResolutionRecord(record))
    }
    if (records.some((record) => "error" in record)) process.exitCode = 1
  },
})

run(cmd, process.argv.slice(2)).catch((err) => {
  console.error(err)
  process.exitCode = 1
})
