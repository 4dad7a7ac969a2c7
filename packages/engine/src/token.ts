import { nanoid } from "nanoid";
import { InvalidTokenError } from "./errors.js";
import type { Token, TokenInit } from "./types.js";

function checkAttributes(token: Token): Token {
  if (!Number.isFinite(token.mass) || token.mass < 0) {
    throw new InvalidTokenError("mass", token.mass, "a non-negative number");
  }
  if (token.purity !== null && !(token.purity >= 0 && token.purity <= 1)) {
    throw new InvalidTokenError("purity", token.purity, "a fraction in [0, 1]");
  }
  if (token.temperature !== null && !Number.isFinite(token.temperature)) {
    throw new InvalidTokenError("temperature", token.temperature, "a finite number");
  }
  if (!Number.isFinite(token.age) || token.age < 0) {
    throw new InvalidTokenError("age", token.age, "a non-negative number");
  }
  return token;
}

/** Short random identifier for tokens created without a batch id. */
export function randomBatchId(): string {
  return nanoid(10);
}

export function createToken(init: TokenInit): Token {
  return checkAttributes({
    type: init.type,
    batchId: init.batchId ?? randomBatchId(),
    mass: init.mass ?? 1,
    temperature: init.temperature ?? null,
    purity: init.purity ?? null,
    age: init.age ?? 0,
  });
}

/** Derived copy of `source` with `patch` applied; time in process carries over. */
export function deriveToken(
  source: Token,
  patch: Partial<Token> = {},
): Token {
  return checkAttributes({
    type: patch.type ?? source.type,
    batchId: patch.batchId ?? source.batchId,
    mass: patch.mass ?? source.mass,
    temperature: patch.temperature !== undefined ? patch.temperature : source.temperature,
    purity: patch.purity !== undefined ? patch.purity : source.purity,
    age: patch.age ?? source.age,
  });
}

export function cloneToken(token: Token): Token {
  return { ...token };
}

export function formatToken(token: Token): string {
  return `${token.type}[${token.batchId}|pur=${token.purity ?? "-"}|T=${token.temperature ?? "-"}]`;
}
