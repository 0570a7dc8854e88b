import { test, expect } from "vitest"
import { SpiceNumber, compareSpiceNumbers, parseNumber } from "../../lib/index"

test("default is zero spelled as 0", () => {
  const n = SpiceNumber.default()
  expect(n.value).toBe(0)
  expect(n.raw).toBe("0")
  expect(n.equals(parseNumber("0"))).toBe(true)
})

test("equality ignores spelling", () => {
  expect(parseNumber("1k").equals(parseNumber("1000"))).toBe(true)
  expect(parseNumber("1Meg").equals(parseNumber("1e6"))).toBe(true)
  expect(parseNumber("1Meg").equals(parseNumber("1m"))).toBe(false)
  expect(parseNumber("1k").compare(parseNumber("1000"))).toBe(0)
})

test("ordering by value", () => {
  expect(parseNumber("1m").compare(parseNumber("1"))).toBe(-1)
  expect(parseNumber("1k").compare(parseNumber("999"))).toBe(1)

  const sorted = ["1k", "10", "2u", "-3"]
    .map((text) => parseNumber(text))
    .sort(compareSpiceNumbers)
    .map((n) => n.raw)
  expect(sorted).toEqual(["-3", "2u", "10", "1k"])
})

test("NaN values are unordered", () => {
  const nan = new SpiceNumber(NaN, "nan")
  expect(nan.compare(SpiceNumber.default())).toBeNaN()
  expect(nan.equals(nan)).toBe(false)
})

test("renders the original text", () => {
  const n = parseNumber("+4.7kOhm")
  expect(n.toString()).toBe("+4.7kOhm")
  expect(`${n}`).toBe("+4.7kOhm")
  expect(Number(n)).toBe(n.value)
})
