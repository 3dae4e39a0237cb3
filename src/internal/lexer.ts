import { createToken, Lexer, type TokenType } from "chevrotain"
import { Either } from "effect"

/**
 * Token definitions for `"<number> <symbol>"` input. Whitespace is skipped so
 * both `"5 kg"` and `"5kg"` lex to the same two tokens. Symbol tokens are
 * generated per family and ordered longest first, so `"mg"` is tried before
 * `"g"` and `"tonnes"` before `"t"`.
 */
export const WhiteSpace = createToken({ name: "WhiteSpace", pattern: /\s+/, group: Lexer.SKIPPED, line_breaks: true })

export const NumberLiteral = createToken({
  name: "NumberLiteral",
  pattern: /[-+]?(?:\d+\.?\d*|\.\d+)(?:[eE][-+]?\d+)?/,
})

export type QuantityLexer<A> = (text: string) => Either.Either<readonly [value: number, target: A], string>

const bySpecificity = ([left]: readonly [string, unknown], [right]: readonly [string, unknown]): number =>
  right.length - left.length || left.localeCompare(right)

export const makeQuantityLexer = <A>(
  name: string,
  symbols: ReadonlyArray<readonly [symbol: string, target: A]>,
): QuantityLexer<A> => {
  const targets = new Map<TokenType, A>()
  const symbolTokens = [...symbols].sort(bySpecificity).map(([symbol, target], index) => {
    const token = createToken({ name: `${name}Symbol${index}`, pattern: symbol })
    targets.set(token, target)
    return token
  })
  const lexer = new Lexer([WhiteSpace, NumberLiteral, ...symbolTokens], {
    positionTracking: "onlyOffset",
  })

  return (text) => {
    const { tokens, errors } = lexer.tokenize(text)
    const [error] = errors
    if (error !== undefined) {
      return Either.left(`unrecognized input at offset ${error.offset}`)
    }
    const [amount, symbol, trailing] = tokens
    if (amount === undefined) {
      return Either.left("expected a number followed by a unit symbol")
    }
    if (amount.tokenType !== NumberLiteral) {
      return Either.left(`expected a number at offset ${amount.startOffset}`)
    }
    if (symbol === undefined) {
      return Either.left("expected a unit symbol after the number")
    }
    const target = targets.get(symbol.tokenType)
    if (target === undefined) {
      return Either.left(`expected a unit symbol at offset ${symbol.startOffset}`)
    }
    if (trailing !== undefined) {
      return Either.left(`unexpected trailing input at offset ${trailing.startOffset}`)
    }
    return Either.right([Number(amount.image), target] as const)
  }
}
