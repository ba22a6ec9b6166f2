/**
 * Effect service exposing the unit algebra as typed effects.
 *
 * The synchronous core throws tagged errors; this layer turns them into typed
 * failures so callers can `Effect.catchTag("ConversionError", …)`. Defaults for
 * the equivalents search come from `Config`, and conversions are logged at
 * debug level.
 *
 * @since 0.1.0
 */

import { Config, Context, Effect, Layer } from "effect"
import { Dimension, type EquivalentsOptions } from "./Dimension.js"
import {
  UnitSystemTypeId,
  isUnitsError,
  type ConversionError,
  type ParseError,
  type UnitsError,
  type UnknownTokenError,
  type ValidationError,
} from "./Errors.js"
import * as Predefined from "./Predefined.js"
import { Quantity } from "./Quantity.js"
import { defaultRegistry, type Registry } from "./Registry.js"
import { Unit, type ConversionCoefficients } from "./Unit.js"

type Failure<Tag extends UnitsError["_tag"]> = Extract<UnitsError, { readonly _tag: Tag }>

const hasTag = <Tag extends UnitsError["_tag"]>(
  error: unknown,
  tags: ReadonlyArray<Tag>,
): error is Failure<Tag> => {
  if (!isUnitsError(error)) {
    return false
  }
  const tag: string = error._tag
  return tags.some((candidate) => candidate === tag)
}

/**
 * Run a throwing computation, failing with the listed engine errors and dying
 * on anything else.
 */
const attempt = <A, Tag extends UnitsError["_tag"]>(
  evaluate: () => A,
  ...tags: ReadonlyArray<Tag>
): Effect.Effect<A, Failure<Tag>> =>
  Effect.suspend((): Effect.Effect<A, Failure<Tag>> => {
    try {
      return Effect.succeed(evaluate())
    } catch (error) {
      return hasTag(error, tags) ? Effect.fail(error) : Effect.die(error)
    }
  })

/**
 * Defaults applied to every equivalents search run through the service.
 *
 * @category Config
 * @since 0.1.0
 */
export const EquivalentsConfig = Config.all({
  maxComposingDimensions: Config.integer("UNITS_EQUIVALENTS_MAX_COMPOSING_DIMENSIONS").pipe(Config.withDefault(5)),
  maxExponent: Config.integer("UNITS_EQUIVALENTS_MAX_EXPONENT").pipe(Config.withDefault(3)),
  maxCombinations: Config.integer("UNITS_EQUIVALENTS_MAX_COMBINATIONS").pipe(Config.withDefault(100_000)),
})

export interface UnitSystemService {
  readonly registry: Registry
  readonly dimension: (expression: string) => Effect.Effect<Dimension, ParseError | UnknownTokenError>
  readonly unit: (expression: string) => Effect.Effect<Unit, ParseError | UnknownTokenError>
  readonly quantity: (
    value: number,
    expression: string,
  ) => Effect.Effect<Quantity, ParseError | UnknownTokenError | ValidationError>
  readonly constant: (key: string) => Effect.Effect<Quantity, UnknownTokenError>
  readonly conversionCoefficients: (
    from: string,
    to: string,
  ) => Effect.Effect<ConversionCoefficients, ParseError | UnknownTokenError | ConversionError>
  readonly convertValue: (
    value: number,
    from: string,
    to: string,
  ) => Effect.Effect<number, ParseError | UnknownTokenError | ConversionError>
  readonly convertQuantity: (
    quantity: Quantity,
    to: string,
  ) => Effect.Effect<Quantity, ParseError | UnknownTokenError | ConversionError>
  readonly simplify: (expression: string) => Effect.Effect<Dimension, ParseError | UnknownTokenError>
  readonly equivalents: (
    expression: string,
    options?: EquivalentsOptions,
  ) => Effect.Effect<ReadonlyArray<Dimension>, ParseError | UnknownTokenError | ValidationError>
}

const unitSystemIdentifier = Symbol.keyFor(UnitSystemTypeId) ?? "unit-algebra/UnitSystem"

export class UnitSystem extends Context.Tag(unitSystemIdentifier)<UnitSystem, UnitSystemService>() {
  static layer(registry: Registry = defaultRegistry()) {
    return Layer.effect(
      this,
      Effect.gen(function* () {
        const defaults = yield* EquivalentsConfig

        const unit = (expression: string) =>
          attempt(() => Unit.parse(expression, registry), "ParseError", "UnknownTokenError")

        const conversionCoefficients = (from: string, to: string) =>
          attempt(
            () => Unit.parse(from, registry).conversionCoefficientsTo(Unit.parse(to, registry)),
            "ParseError",
            "UnknownTokenError",
            "ConversionError",
          ).pipe(
            Effect.tap(({ shift, factor }) => Effect.logDebug(`conversion coefficients shift=${shift} factor=${factor}`)),
            Effect.annotateLogs({ from, to }),
          )

        const service: UnitSystemService = {
          registry,
          dimension: (expression) =>
            attempt(() => Dimension.parse(expression, registry), "ParseError", "UnknownTokenError"),
          unit,
          quantity: (value, expression) =>
            attempt(() => Quantity.make(value, expression, registry), "ParseError", "UnknownTokenError", "ValidationError"),
          constant: (key) => attempt(() => Predefined.constant(key, registry), "UnknownTokenError"),
          conversionCoefficients,
          convertValue: (value, from, to) =>
            Effect.map(conversionCoefficients(from, to), ({ shift, factor }) => (value + shift) * factor),
          convertQuantity: (quantity, to) =>
            attempt(() => quantity.convertTo(to), "ParseError", "UnknownTokenError", "ConversionError").pipe(
              Effect.tap((converted) => Effect.logDebug(`converted ${quantity} to ${converted}`)),
            ),
          simplify: (expression) =>
            attempt(
              () => Dimension.parse(expression, registry).equivalentShortestComposition(),
              "ParseError",
              "UnknownTokenError",
            ),
          equivalents: (expression, options = {}) =>
            Effect.gen(function* () {
              const dimension = yield* attempt(() => Dimension.parse(expression, registry), "ParseError", "UnknownTokenError")
              const search = yield* attempt(
                () => dimension.searchEquivalents({ ...defaults, ...options }),
                "ValidationError",
              )
              if (!search.exhausted) {
                yield* Effect.logWarning(
                  `equivalents search stopped after ${search.combinationsSolved} of ${search.combinationsTotal} combinations`,
                )
              }
              return search.dimensions
            }).pipe(Effect.annotateLogs({ expression })),
        }

        return service
      }),
    )
  }

  /** Service over the bundled registry, which is built when the layer is. */
  static readonly Default = Layer.suspend(() => UnitSystem.layer())
}
