/** Token counts keyed by place name. */
export type Marking<Place extends string = string> = Record<Place, number>;

/**
 * A unit of material. Attributes are read-only; `age` is the one field the
 * owning net advances as its clock ticks.
 */
export type Token = {
  readonly type: string;
  readonly batchId: string;
  readonly mass: number;
  readonly temperature: number | null;
  readonly purity: number | null;
  age: number;
};

export type TokenInit = {
  type: string;
  batchId?: string;
  mass?: number;
  temperature?: number | null;
  purity?: number | null;
  age?: number;
};

export type TokenPredicate = (token: Token) => boolean;

/** Tokens picked for a firing, keyed by input place, not yet removed. */
export type SelectedTokens = ReadonlyMap<string, readonly Token[]>;

/**
 * Read-only view of a net handed to guards and production rules.
 * Nothing reachable from it can change the marking.
 */
export interface NetView {
  readonly time: number;
  statusSnapshot(): Marking;
  tokensIn(place: string): readonly Token[];
  countIn(place: string, type?: string): number;
  massIn(place: string, type?: string): number;
}

export type GuardFn = (view: NetView, selected: SelectedTokens) => boolean;

/** Function guard, or a filtrex expression over `marking`, `time` and `selected`. */
export type Guard = GuardFn | string;

export type InputArc = {
  weight: number;
  /** Only tokens matching this are eligible for selection. */
  select?: TokenPredicate;
};

export type ProductionContext = {
  readonly view: NetView;
  readonly transition: string;
  nextBatchId(): string;
  random(): number;
  /** Bump a named statistic on the net. */
  record(stat: string, by?: number): void;
  /** Deliver tokens to any place, bypassing the declared output mapping. */
  emit(place: string, tokens: Token | readonly Token[]): void;
};

export type TokenFactory = (ctx: ProductionContext, index: number) => Token;

export type ProduceFn = (
  consumed: SelectedTokens,
  ctx: ProductionContext,
) => Token | readonly Token[] | void;

export type OutputRule =
  | { kind: "emit"; count: number; factory: TokenFactory }
  | {
      kind: "transfer";
      from: string;
      map?: (token: Token, ctx: ProductionContext) => Token;
    }
  | { kind: "produce"; produce: ProduceFn };

export type TransitionDef = {
  name: string;
  description?: string;
  inputs?: Record<string, number | InputArc>;
  outputs?: Record<string, OutputRule>;
  guard?: Guard | null;
};

export type RejectionReason =
  | "insufficient-tokens"
  | "selection-failed"
  | "guard-blocked";

export type FireResult =
  | {
      ok: true;
      transition: string;
      consumed: SelectedTokens;
      produced: ReadonlyMap<string, readonly Token[]>;
    }
  | {
      ok: false;
      transition: string;
      reason: RejectionReason;
      detail: string;
    };
