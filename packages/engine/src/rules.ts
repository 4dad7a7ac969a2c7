import type {
  OutputRule,
  ProduceFn,
  ProductionContext,
  Token,
  TokenFactory,
} from "./types.js";

/** `count` fresh tokens from `factory`, called once per token. */
export function emit(count: number, factory: TokenFactory): OutputRule {
  return { kind: "emit", count, factory };
}

/** Moves the tokens consumed from input place `from`, optionally as derived tokens. */
export function transfer(
  from: string,
  map?: (token: Token, ctx: ProductionContext) => Token,
): OutputRule {
  return map ? { kind: "transfer", from, map } : { kind: "transfer", from };
}

/** Computed production; the rule may also deliver elsewhere through `ctx.emit`. */
export function produce(fn: ProduceFn): OutputRule {
  return { kind: "produce", produce: fn };
}
