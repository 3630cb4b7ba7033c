import { DEFAULT_TOLERANCE, type Tolerance } from "../../core/types.js";

const NUMBER_TOKEN = /-?\d+\.?\d*/;

function isDigit(ch: string | undefined): boolean {
  return ch !== undefined && ch >= "0" && ch <= "9";
}

/**
 * True when the occurrence at [start, end) is a fragment of a larger number,
 * e.g. "9.8" inside "9.81" or "4" inside "42".
 */
function isInsideNumber(haystack: string, needle: string, start: number): boolean {
  const end = start + needle.length;
  if (isDigit(needle[0])) {
    const before = haystack[start - 1];
    if (isDigit(before)) return true;
    if (before === "." && isDigit(haystack[start - 2])) return true;
  }
  if (isDigit(needle[needle.length - 1])) {
    const after = haystack[end];
    if (isDigit(after)) return true;
    if (after === "." && isDigit(haystack[end + 1])) return true;
  }
  return false;
}

export function containsAnswer(response: string, expected: string): boolean {
  if (expected.length === 0) return false;
  let index = response.indexOf(expected);
  while (index !== -1) {
    if (!isInsideNumber(response, expected, index)) return true;
    index = response.indexOf(expected, index + 1);
  }
  return false;
}

export function firstNumber(text: string): number | null {
  const match = text.match(NUMBER_TOKEN);
  if (!match) return null;
  const value = Number.parseFloat(match[0]);
  return Number.isFinite(value) ? value : null;
}

/**
 * Relative deviation |actual - expected| / |expected|, or null when it is
 * undefined (expected value of zero).
 */
export function relativeDifference(actual: number, expected: number): number | null {
  if (expected === 0) return null;
  const diff = Math.abs(actual - expected) / Math.abs(expected);
  return Number.isFinite(diff) ? diff : null;
}

export function parseTolerance(
  raw: number | string | null | undefined,
  fallback = DEFAULT_TOLERANCE,
): Tolerance {
  if (raw === "exact") return { kind: "exact" };
  if (raw === null || raw === undefined || raw === "") return { kind: "relative", fraction: fallback };
  const fraction = typeof raw === "number" ? raw : Number.parseFloat(raw);
  if (!Number.isFinite(fraction) || fraction < 0) {
    throw new RangeError(`Invalid tolerance: ${String(raw)}`);
  }
  return { kind: "relative", fraction };
}

/**
 * Scores a response against the expected answer.
 *
 * A match of the expected text anywhere in the response wins outright. Failing
 * that, the first number in each is compared within the relative tolerance;
 * "exact" items skip the numeric comparison.
 */
export function isCorrect(
  response: string | null | undefined,
  expectedAnswer: string | number,
  tolerance: Tolerance = { kind: "relative", fraction: DEFAULT_TOLERANCE },
): boolean {
  if (!response) return false;

  const actual = response.toLowerCase().trim();
  const expected = String(expectedAnswer).toLowerCase().trim();

  if (containsAnswer(actual, expected)) return true;
  if (tolerance.kind === "exact") return false;

  const actualValue = firstNumber(actual);
  // String(1e-7) is "1e-7", whose first token would read as 1
  const expectedValue = typeof expectedAnswer === "number" ? expectedAnswer : firstNumber(expected);
  if (actualValue === null || expectedValue === null || !Number.isFinite(expectedValue)) return false;

  const diff = relativeDifference(actualValue, expectedValue);
  return diff !== null && diff <= tolerance.fraction;
}
