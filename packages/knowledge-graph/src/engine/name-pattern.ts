/**
 * Name Pattern
 *
 * Regular-expression filter over entity names.
 *
 * Dialect: ECMAScript regular expressions, no flags. Matching is
 * case-sensitive and unanchored (use ^ and $ to anchor).
 *
 * Complexity bound: patterns are rejected when they
 * - are longer than MAX_NAME_PATTERN_LENGTH characters
 * - contain back-references (\1, \k<name>) or lookbehind assertions
 * - repeat a group that contains a repetition, e.g. (a+)+ or (a|b?){2,}
 * - repeat a group that contains an alternation, e.g. (a|a)* or (?:x|y)?
 * - use more than MAX_QUANTIFIERS quantifiers
 * With no repeated ambiguity left, backtracking is polynomial in the name
 * length, of degree at most MAX_QUANTIFIERS + 1.
 */

import { ValidationError } from "../errors"

export const MAX_NAME_PATTERN_LENGTH = 256
export const MAX_QUANTIFIERS = 3

interface GroupFrame {
  /** Contains a quantifier at any depth */
  quantified: boolean
  /** Contains an alternation at any depth */
  alternation: boolean
}

function reject(source: string, reason: string): never {
  throw new ValidationError(`Invalid name pattern '${source}': ${reason}`, "namePattern", source)
}

/**
 * Length of the quantifier starting at index, lazy suffix included; 0 when none.
 */
function quantifierLength(source: string, index: number): number {
  const char = source[index]
  let length = 0
  if (char === "*" || char === "+" || char === "?") {
    length = 1
  } else if (char === "{") {
    length = /^\{\d+(,\d*)?\}/.exec(source.slice(index))?.[0].length ?? 0
  }
  if (length > 0 && source[index + length] === "?") length++
  return length
}

/**
 * Length of a group prefix such as `?:`, `?=` or `?<name>` after an opening paren.
 */
function groupPrefixLength(source: string, index: number): number {
  if (source[index] !== "?") return 0
  const next = source[index + 1]
  if (next === ":" || next === "=" || next === "!") return 2
  if (next === "<") {
    const close = source.indexOf(">", index)
    return close === -1 ? 1 : close - index + 1
  }
  return 1
}

/**
 * Scan a pattern source for constructs outside the supported subset.
 */
function checkComplexity(source: string): void {
  const stack: GroupFrame[] = [{ quantified: false, alternation: false }]
  let quantifiers = 0
  let i = 0

  const countQuantifier = (): void => {
    quantifiers++
    if (quantifiers > MAX_QUANTIFIERS) {
      reject(source, `more than ${MAX_QUANTIFIERS} quantifiers are not supported`)
    }
  }

  while (i < source.length) {
    const char = source[i]
    const current = stack[stack.length - 1]

    if (char === "\\") {
      const next = source[i + 1] ?? ""
      if (/[1-9]/.test(next) || (next === "k" && source[i + 2] === "<")) {
        reject(source, "back-references are not supported")
      }
      i += 2
      continue
    }

    if (char === "[") {
      // Skip the character class; quantifier characters inside are literals
      i++
      while (i < source.length && source[i] !== "]") {
        i += source[i] === "\\" ? 2 : 1
      }
      i++
      continue
    }

    if (char === "(") {
      if (source.startsWith("(?<=", i) || source.startsWith("(?<!", i)) {
        reject(source, "lookbehind assertions are not supported")
      }
      stack.push({ quantified: false, alternation: false })
      i++
      i += groupPrefixLength(source, i)
      continue
    }

    if (char === ")") {
      const group = stack.length > 1 ? stack.pop() : undefined
      const parent = stack[stack.length - 1]
      i++
      if (!group || !parent) continue

      const length = quantifierLength(source, i)
      if (length > 0) {
        if (group.quantified) reject(source, "nested quantifiers are not supported")
        if (group.alternation) reject(source, "quantified alternations are not supported")
        countQuantifier()
        parent.quantified = true
        i += length
        continue
      }
      if (group.quantified) parent.quantified = true
      if (group.alternation) parent.alternation = true
      continue
    }

    if (char === "|") {
      if (current) current.alternation = true
      i++
      continue
    }

    const length = quantifierLength(source, i)
    if (current && length > 0) {
      current.quantified = true
      countQuantifier()
      i += length
      continue
    }
    i++
  }
}

export class NamePattern {
  private constructor(
    readonly source: string,
    private readonly regex: RegExp,
  ) {}

  /**
   * Compile a pattern after checking it against the complexity bound.
   * @throws ValidationError for unsupported or malformed patterns
   */
  static compile(source: string): NamePattern {
    if (source.length > MAX_NAME_PATTERN_LENGTH) {
      reject(source.slice(0, 32) + "...", `longer than ${MAX_NAME_PATTERN_LENGTH} characters`)
    }
    checkComplexity(source)

    try {
      return new NamePattern(source, new RegExp(source))
    } catch (error) {
      if (error instanceof SyntaxError) {
        reject(source, error.message)
      }
      throw error
    }
  }

  /**
   * Whether the pattern occurs anywhere in the name.
   */
  matches(name: string): boolean {
    return this.regex.test(name)
  }
}
