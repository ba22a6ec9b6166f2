/**
 * @since 0.1.0
 */
export * from "./Errors.js"
export * from "./Registry.js"
export * from "./Dimension.js"
export * from "./Unit.js"
export * from "./Quantity.js"
export * as Predefined from "./Predefined.js"
export * from "./UnitSystem.js"
export { parseExpression, type Term } from "./internal/expression/Parser.js"
export { formatExpression } from "./internal/expression/Format.js"
