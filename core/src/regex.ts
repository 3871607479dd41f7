import { errorMessage } from "./errors";

// ---------------------------------------------------------------------------
// Regex safety utilities
// ---------------------------------------------------------------------------

/**
 * Known dangerous regex shapes that can cause catastrophic backtracking.
 */
const DANGEROUS_REGEX_PATTERNS = [
  /\(.*[+*].*\)[+*]/, // nested quantifiers: (a+)+, (a*)*
  /\(.*\|.*\)[+*]/,   // alternation inside quantifier: (a|a)+
  /\(.*[+*].*\)\{/,   // nested quantifier with repetition: (a+){2,}
];

export const MAX_REGEX_LENGTH = 512;

/**
 * Describe why a user-supplied pattern is rejected, or return null when it
 * compiles and passes the backtracking guard.
 */
export function checkRegexPattern(pattern: string): string | null {
  if (pattern.length > MAX_REGEX_LENGTH) {
    return `pattern exceeds ${MAX_REGEX_LENGTH} characters`;
  }

  for (const dangerous of DANGEROUS_REGEX_PATTERNS) {
    if (dangerous.test(pattern)) return "pattern may cause catastrophic backtracking";
  }

  try {
    new RegExp(pattern, "i");
    return null;
  } catch (err) {
    return `pattern does not compile: ${errorMessage(err)}`;
  }
}

const regexCache = new Map<string, RegExp | null>();

/**
 * Compile and cache a case-insensitive regex, or return null if it's unsafe/invalid.
 */
export function getSafeRegex(pattern: string): RegExp | null {
  const cached = regexCache.get(pattern);
  if (cached !== undefined) return cached;

  const regex = checkRegexPattern(pattern) === null ? new RegExp(pattern, "i") : null;
  regexCache.set(pattern, regex);
  return regex;
}
