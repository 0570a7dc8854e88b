import { test, expect } from "vitest"
import { readLiteralsFromText } from "../../lib/index"

const text = `
* component values
1k 2.2k   4.7Meg
10u ; decoupling

\t-4E-08\r
`

test("readLiteralsFromText: skips comments and blank lines", () => {
  expect(readLiteralsFromText(text)).toEqual([
    "1k",
    "2.2k",
    "4.7Meg",
    "10u",
    "-4E-08",
  ])
})

test("readLiteralsFromText: empty text", () => {
  expect(readLiteralsFromText("")).toEqual([])
})
