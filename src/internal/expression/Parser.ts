import type { IToken, TokenType } from "chevrotain"
import { ParseError } from "../../Errors.js"
import {
  Base,
  Caret,
  Dot,
  ExponentCaret,
  ExponentDot,
  ExpressionLexer,
  Integer,
  Sign,
  Slash,
  Superscript,
} from "./tokens.js"

/**
 * One `base^exponent` factor of a dotted expression.
 */
export interface Term {
  readonly base: string
  readonly exponent: number
}

const FROM_SUPERSCRIPT: Readonly<Record<string, string>> = {
  "⁰": "0",
  "¹": "1",
  "²": "2",
  "³": "3",
  "⁴": "4",
  "⁵": "5",
  "⁶": "6",
  "⁷": "7",
  "⁸": "8",
  "⁹": "9",
  "⁺": "+",
  "⁻": "-",
  "⁄": "/",
}

class Stream {
  readonly #tokens: ReadonlyArray<IToken>
  readonly #input: string
  #index = 0

  constructor(tokens: ReadonlyArray<IToken>, input: string) {
    this.#tokens = tokens
    this.#input = input
  }

  peek(): IToken | undefined {
    return this.#tokens[this.#index]
  }

  match(...types: ReadonlyArray<TokenType>): IToken | undefined {
    const token = this.peek()
    if (token && types.includes(token.tokenType)) {
      this.#index += 1
      return token
    }
    return undefined
  }

  expect(type: TokenType, problem: string): IToken {
    const token = this.match(type)
    if (!token) {
      throw this.error(problem)
    }
    return token
  }

  done(): boolean {
    return this.#index >= this.#tokens.length
  }

  error(problem: string): ParseError {
    const token = this.peek()
    const where = token ? ` at offset ${token.startOffset}` : " at end of input"
    return new ParseError({ input: this.#input, problem: `${problem}${where}` })
  }
}

const rational = (numerator: number, denominator: number, stream: Stream): number => {
  if (denominator === 0) {
    throw stream.error("Exponent denominator must not be zero")
  }
  return numerator / denominator
}

const parseCaretExponent = (stream: Stream): number => {
  const sign = stream.match(Sign)
  const numerator = Number(stream.expect(Integer, "Expected an integer exponent after '^'").image)
  let exponent = numerator
  if (stream.match(Slash)) {
    const denominator = Number(stream.expect(Integer, "Expected a denominator after '/'").image)
    exponent = rational(numerator, denominator, stream)
  }
  if (stream.peek()?.tokenType === ExponentCaret) {
    throw stream.error("Only one '^' may appear in each term")
  }
  return sign?.image === "-" ? -exponent : exponent
}

const parseSuperscript = (token: IToken, stream: Stream): number => {
  const plain = [...token.image].map((char) => FROM_SUPERSCRIPT[char] ?? char).join("")
  const [numerator = "", denominator] = plain.split("/")
  const value = Number(numerator)
  return denominator === undefined ? value : rational(value, Number(denominator), stream)
}

const parseTerm = (stream: Stream): Term => {
  const base = stream.match(Base)
  if (!base) {
    throw stream.error("Expected a base; consecutive, leading or trailing '.' symbols are not allowed")
  }
  const superscript = stream.match(Superscript)
  let exponent = superscript ? parseSuperscript(superscript, stream) : 1
  if (stream.match(Caret)) {
    if (superscript) {
      throw stream.error("A term may carry either a superscript or a '^' exponent, not both")
    }
    exponent = parseCaretExponent(stream)
  }
  return { base: base.image, exponent }
}

/**
 * Split a dotted `base^exponent` expression into its terms.
 *
 * Exponents are integers or `numerator/denominator` fractions, written after a
 * `^` or as a trailing superscript (`m²`, `s⁻¹`, `m³⁄²`). Repeated bases are
 * returned as separate terms; callers sum them.
 *
 * @example
 * ```ts
 * parseExpression("kg.m^2.s^-2")
 * // [{ base: "kg", exponent: 1 }, { base: "m", exponent: 2 }, { base: "s", exponent: -2 }]
 * ```
 */
export const parseExpression = (input: string): ReadonlyArray<Term> => {
  if (input.trim() === "") {
    throw new ParseError({ input, problem: "Expression is empty" })
  }
  const lexing = ExpressionLexer.tokenize(input)
  const lexError = lexing.errors[0]
  if (lexError) {
    throw new ParseError({
      input,
      problem: `Unexpected character "${input.charAt(lexError.offset)}" at offset ${lexError.offset}`,
    })
  }
  const stream = new Stream(lexing.tokens, input)
  const terms: Array<Term> = [parseTerm(stream)]
  while (!stream.done()) {
    if (stream.peek()?.tokenType === ExponentCaret) {
      throw stream.error("Only one '^' may appear in each term")
    }
    if (!stream.match(Dot, ExponentDot)) {
      throw stream.error("Expected '.' between terms")
    }
    terms.push(parseTerm(stream))
  }
  return terms
}
