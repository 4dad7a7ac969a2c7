import { CapacityExceededError, TokenAliasError, TokenNotFoundError } from "./errors.js";
import { cloneToken } from "./token.js";
import type { Token, TokenPredicate } from "./types.js";

export type PlaceOptions = {
  /** Maximum number of resident tokens. Unbounded when omitted. */
  capacity?: number;
};

function isTokenList(tokens: Token | readonly Token[]): tokens is readonly Token[] {
  return Array.isArray(tokens);
}

export function asTokenList(tokens: Token | readonly Token[]): readonly Token[] {
  return isTokenList(tokens) ? tokens : [tokens];
}

export class Place {
  readonly name: string;
  readonly capacity: number | null;
  private held: Token[] = [];

  constructor(name: string, options: PlaceOptions = {}) {
    if (
      options.capacity !== undefined &&
      (!Number.isInteger(options.capacity) || options.capacity < 0)
    ) {
      throw new Error(
        `Place "${name}" capacity must be a non-negative integer, got ${options.capacity}`,
      );
    }
    this.name = name;
    this.capacity = options.capacity ?? null;
  }

  get tokens(): readonly Token[] {
    return this.held;
  }

  /** Room left before the capacity bound; Infinity when unbounded. */
  remaining(): number {
    return this.capacity === null ? Infinity : this.capacity - this.held.length;
  }

  /**
   * Adds one token or a batch. Nothing is added if the batch does not fit,
   * repeats an instance, or holds one this place already has.
   */
  addTokens(tokens: Token | readonly Token[]): void {
    const batch = asTokenList(tokens);
    const incoming = new Set<Token>();
    for (const token of batch) {
      if (incoming.has(token) || this.held.includes(token)) {
        throw new TokenAliasError(this.name, token.batchId);
      }
      incoming.add(token);
    }
    if (this.capacity !== null && this.held.length + batch.length > this.capacity) {
      throw new CapacityExceededError(
        this.name,
        this.capacity,
        this.held.length + batch.length,
      );
    }
    this.held.push(...batch);
  }

  /** Removes tokens by identity. Nothing is removed if any token is missing. */
  removeTokens(tokens: Token | readonly Token[]): void {
    const doomed = new Set<Token>();
    for (const token of asTokenList(tokens)) {
      if (doomed.has(token) || !this.held.includes(token)) {
        throw new TokenNotFoundError(this.name, token.batchId);
      }
      doomed.add(token);
    }
    this.held = this.held.filter((t) => !doomed.has(t));
  }

  /**
   * First-match selection in place order. The returned iterable is lazy and
   * can be iterated again, each pass starting from the front.
   */
  findTokens(predicate?: TokenPredicate, limit?: number): Iterable<Token> {
    const held = () => this.held;
    return {
      *[Symbol.iterator]() {
        if (limit !== undefined && limit <= 0) return;
        let found = 0;
        for (const token of held()) {
          if (predicate && !predicate(token)) continue;
          yield token;
          found++;
          if (limit !== undefined && found >= limit) return;
        }
      },
    };
  }

  count(type?: string): number {
    if (type === undefined) return this.held.length;
    return this.held.filter((t) => t.type === type).length;
  }

  mass(type?: string): number {
    return this.held
      .filter((t) => type === undefined || t.type === type)
      .reduce((sum, t) => sum + t.mass, 0);
  }

  /** Token counts per type, in first-seen order. */
  countByType(): Map<string, number> {
    const counts = new Map<string, number>();
    for (const token of this.held) {
      counts.set(token.type, (counts.get(token.type) ?? 0) + 1);
    }
    return counts;
  }

  /** Advances the residence age of every token. */
  age(dt: number): void {
    for (const token of this.held) {
      token.age += dt;
    }
  }

  clear(): void {
    this.held = [];
  }

  clone(): Place {
    const copy = new Place(
      this.name,
      this.capacity === null ? {} : { capacity: this.capacity },
    );
    copy.held = this.held.map(cloneToken);
    return copy;
  }
}
