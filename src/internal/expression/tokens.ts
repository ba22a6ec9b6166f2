import { createToken, Lexer } from "chevrotain"

const SUPERSCRIPT_DIGITS = "⁰¹²³⁴⁵⁶⁷⁸⁹"

export const WhiteSpace = createToken({ name: "WhiteSpace", pattern: /\s+/, group: Lexer.SKIPPED })

export const Dot = createToken({ name: "Dot", pattern: /\./ })

export const Caret = createToken({ name: "Caret", pattern: /\^/, push_mode: "exponent" })

export const Superscript = createToken({
  name: "Superscript",
  pattern: new RegExp(`[⁺⁻]?[${SUPERSCRIPT_DIGITS}]+(?:⁄[${SUPERSCRIPT_DIGITS}]+)?`),
})

// bases may hold inner blanks ("degree Celsius") but never a separator or exponent
const BASE_CHAR = `[^.\\^\\s${SUPERSCRIPT_DIGITS}⁺⁻⁄]`

export const Base = createToken({
  name: "Base",
  pattern: new RegExp(`${BASE_CHAR}+(?:[ \\t]+${BASE_CHAR}+)*`),
})

export const ExponentDot = createToken({ name: "ExponentDot", pattern: /\./, pop_mode: true })

export const ExponentCaret = createToken({ name: "ExponentCaret", pattern: /\^/ })

export const Sign = createToken({ name: "Sign", pattern: /[+-]/ })

export const Integer = createToken({ name: "Integer", pattern: /\d+/ })

export const Slash = createToken({ name: "Slash", pattern: /\// })

export const ExpressionLexer = new Lexer(
  {
    modes: {
      base: [WhiteSpace, Dot, Caret, Superscript, Base],
      exponent: [WhiteSpace, ExponentDot, ExponentCaret, Sign, Integer, Slash],
    },
    defaultMode: "base",
  },
  { positionTracking: "onlyOffset", safeMode: true },
)
