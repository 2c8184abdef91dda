import { MAX_GRADE_MAGNITUDE } from "../constants.js";
import { InvalidInputError } from "../errors/index.js";

export type ParsedGrades = {
  grades: number[];
  ignoredTokens: string[];
};

// Plain decimal literals only: no hex, binary, Infinity or NaN.
// Values beyond MAX_GRADE_MAGNITUDE are treated as unparseable.
const NUMERIC_TOKEN = /^[+-]?(\d+(\.\d*)?|\.\d+)([eE][+-]?\d+)?$/;

export function parseGradeToken(token: string): number | null {
  if (!NUMERIC_TOKEN.test(token)) {
    return null;
  }
  const value = Number(token);
  return Math.abs(value) <= MAX_GRADE_MAGNITUDE ? value : null;
}

/**
 * Converts comma-separated text into a grade list. Blank tokens are dropped
 * silently, unparseable ones are skipped and reported in `ignoredTokens`.
 *
 * @throws {InvalidInputError} when no token parses to a number.
 */
export function parseGradeList(text: string): ParsedGrades {
  const grades: number[] = [];
  const ignoredTokens: string[] = [];
  for (const rawToken of text.split(",")) {
    const token = rawToken.trim();
    if (!token) {
      continue;
    }
    const value = parseGradeToken(token);
    if (value === null) {
      ignoredTokens.push(token);
    } else {
      grades.push(value);
    }
  }
  if (grades.length === 0) {
    throw new InvalidInputError({
      message:
        ignoredTokens.length === 0
          ? "Please enter at least one grade."
          : "Please enter valid numeric grades separated by commas.",
    });
  }
  return { grades, ignoredTokens };
}
