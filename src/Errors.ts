/**
 * Error taxonomy for the unit algebra.
 *
 * Every failure is a tagged error, so the synchronous core can `throw` it at the
 * point of detection while the Effect surface (`UnitSystem`) exposes the same
 * values as typed failures that callers can handle with `Effect.catchTag`.
 *
 * @since 0.1.0
 */

import { Data } from "effect"

/**
 * Unique symbol used to tag the unit-system service within the context graph.
 *
 * @since 0.1.0
 */
export const UnitSystemTypeId = Symbol.for("unit-algebra/UnitSystem")

/**
 * Raised when an expression string does not follow the dotted
 * `base^exponent` grammar.
 *
 * @category Errors
 * @since 0.1.0
 * @example
 * ```ts
 * throw new ParseError({ input: "kg..m", problem: "empty term" })
 * ```
 */
export class ParseError extends Data.TaggedError("ParseError")<{
  readonly input: string
  readonly problem: string
}> {
  override get message(): string {
    return `Cannot parse "${this.input}": ${this.problem}`
  }
}

/**
 * What kind of registry entry a token was looked up as.
 *
 * @category Errors
 * @since 0.1.0
 */
export type TokenKind = "dimension" | "unit" | "constant"

/**
 * Raised when a parsed base (or a lookup key) is not registered.
 *
 * @category Errors
 * @since 0.1.0
 */
export class UnknownTokenError extends Data.TaggedError("UnknownTokenError")<{
  readonly token: string
  readonly kind: TokenKind
}> {
  override get message(): string {
    return `Unknown ${this.kind} "${this.token}"`
  }
}

/**
 * Raised for malformed raw input: exponent vectors of the wrong length or with
 * non-numeric entries, operands of the wrong type or registry, bad registry data.
 *
 * @category Errors
 * @since 0.1.0
 */
export class ValidationError extends Data.TaggedError("ValidationError")<{
  readonly problem: string
}> {
  override get message(): string {
    return this.problem
  }
}

/**
 * Raised when two units do not share a dimension, ignoring amount of substance.
 *
 * @category Errors
 * @since 0.1.0
 */
export class ConversionError extends Data.TaggedError("ConversionError")<{
  readonly from: string
  readonly to: string
  readonly fromDimension: string
  readonly toDimension: string
}> {
  override get message(): string {
    return `Cannot convert ${this.from} [${this.fromDimension}] to ${this.to} [${this.toDimension}]: dimensions do not match`
  }
}

/**
 * Union of every error the engine raises.
 *
 * @category Errors
 * @since 0.1.0
 */
export type UnitsError = ParseError | UnknownTokenError | ValidationError | ConversionError

/**
 * Refinement for engine errors, used where thrown values cross into Effect.
 *
 * @category Guards
 * @since 0.1.0
 */
export const isUnitsError = (error: unknown): error is UnitsError =>
  error instanceof ParseError ||
  error instanceof UnknownTokenError ||
  error instanceof ValidationError ||
  error instanceof ConversionError
