import { CapacityExceededError, TokenAliasError } from "./errors.js";
import { compileGuard } from "./guard.js";
import { asTokenList, type Place } from "./place.js";
import { cloneToken } from "./token.js";
import type {
  FireResult,
  GuardFn,
  InputArc,
  NetView,
  OutputRule,
  ProductionContext,
  RejectionReason,
  SelectedTokens,
  Token,
  TransitionDef,
} from "./types.js";

/** What a transition needs from the net it fires in. */
export interface FiringHost {
  readonly view: NetView;
  readonly placeNames: readonly string[];
  place(name: string): Place;
  /** The id `ahead` allocations from now, without allocating it. */
  previewBatchId(ahead: number): string;
  commitBatchIds(count: number): void;
  random(): number;
  record(stat: string, by?: number): void;
}

function normaliseArc(place: string, arc: number | InputArc): InputArc {
  const normalised = typeof arc === "number" ? { weight: arc } : arc;
  if (!Number.isInteger(normalised.weight) || normalised.weight < 1) {
    throw new Error(
      `Input arc from "${place}" must have a positive integer weight, got ${normalised.weight}`,
    );
  }
  return normalised;
}

function copyTokens(
  tokens: ReadonlyMap<string, readonly Token[]>,
): Map<string, readonly Token[]> {
  return new Map(
    [...tokens].map(([place, list]): [string, readonly Token[]] => [place, list.map(cloneToken)]),
  );
}

function reject(
  transition: string,
  reason: RejectionReason,
  detail: string,
): FireResult {
  return { ok: false, transition, reason, detail };
}

export class Transition {
  readonly name: string;
  readonly description: string;
  readonly inputs: ReadonlyMap<string, InputArc>;
  readonly outputs: ReadonlyMap<string, OutputRule>;
  readonly guard: GuardFn | null;
  readonly guardExpression: string | null;
  firedCount = 0;
  private readonly def: TransitionDef;

  constructor(def: TransitionDef) {
    this.def = def;
    this.name = def.name;
    this.description = def.description ?? "";

    const inputs = new Map<string, InputArc>();
    for (const [place, arc] of Object.entries(def.inputs ?? {})) {
      inputs.set(place, normaliseArc(place, arc));
    }
    this.inputs = inputs;

    const transferred = new Set<string>();
    for (const [place, rule] of Object.entries(def.outputs ?? {})) {
      if (rule.kind === "emit" && (!Number.isInteger(rule.count) || rule.count < 0)) {
        throw new Error(
          `Transition "${def.name}" emits a non-integer count into "${place}"`,
        );
      }
      if (rule.kind === "transfer") {
        if (!inputs.has(rule.from)) {
          throw new Error(
            `Transition "${def.name}" transfers from "${rule.from}", which is not one of its inputs`,
          );
        }
        if (transferred.has(rule.from)) {
          throw new Error(
            `Transition "${def.name}" transfers the tokens of "${rule.from}" more than once`,
          );
        }
        transferred.add(rule.from);
      }
    }
    this.outputs = new Map(Object.entries(def.outputs ?? {}));

    if (typeof def.guard === "string") {
      this.guard = compileGuard(def.guard, def.name);
      this.guardExpression = def.guard;
    } else {
      this.guard = def.guard ?? null;
      this.guardExpression = null;
    }
  }

  /** Every place an arc or output rule of this transition names. */
  referencedPlaces(): string[] {
    return [...new Set([...this.inputs.keys(), ...this.outputs.keys()])];
  }

  /** Count check only; the guard is not consulted. */
  isEnabled(host: FiringHost): boolean {
    for (const [place, arc] of this.inputs) {
      if (host.place(place).count() < arc.weight) return false;
    }
    return true;
  }

  /** Picks the first matching tokens per input place, or null if any place falls short. */
  selectTokens(host: FiringHost): SelectedTokens | null {
    const selected = new Map<string, readonly Token[]>();
    for (const [place, arc] of this.inputs) {
      const tokens = [...host.place(place).findTokens(arc.select, arc.weight)];
      if (tokens.length < arc.weight) return null;
      selected.set(place, tokens);
    }
    return selected;
  }

  fire(host: FiringHost): FireResult {
    for (const [place, arc] of this.inputs) {
      const available = host.place(place).count();
      if (available < arc.weight) {
        return reject(
          this.name,
          "insufficient-tokens",
          `"${place}" holds ${available}, needs ${arc.weight}`,
        );
      }
    }

    const selected = this.selectTokens(host);
    if (!selected) {
      return reject(
        this.name,
        "selection-failed",
        "not enough tokens match the input selection",
      );
    }

    // Guards and rules work on copies; only an unmapped transfer moves
    // the resident instances.
    const copies = copyTokens(selected);
    if (this.guard && !this.guard(host.view, copies)) {
      return reject(this.name, "guard-blocked", "guard rejected the selected tokens");
    }

    // Outputs, batch ids and stats are staged so a failing rule or check
    // leaves the net untouched.
    const staged = new Map<string, Token[]>();
    const records: [string, number][] = [];
    let idsIssued = 0;
    const stage = (place: string, tokens: readonly Token[]) => {
      host.place(place);
      const list = staged.get(place) ?? [];
      list.push(...tokens);
      staged.set(place, list);
    };

    const ctx: ProductionContext = {
      view: host.view,
      transition: this.name,
      nextBatchId: () => {
        idsIssued++;
        return host.previewBatchId(idsIssued);
      },
      random: () => host.random(),
      record: (stat, by = 1) => {
        records.push([stat, by]);
      },
      emit: (place, tokens) => stage(place, asTokenList(tokens)),
    };

    for (const [place, rule] of this.outputs) {
      switch (rule.kind) {
        case "emit":
          for (let i = 0; i < rule.count; i++) {
            stage(place, [rule.factory(ctx, i)]);
          }
          break;
        case "transfer": {
          const map = rule.map;
          stage(
            place,
            map
              ? (copies.get(rule.from) ?? []).map((t) => map(t, ctx))
              : (selected.get(rule.from) ?? []),
          );
          break;
        }
        case "produce": {
          const out = rule.produce(copies, ctx);
          if (out) stage(place, asTokenList(out));
          break;
        }
      }
    }

    const consumed = new Set([...selected.values()].flat());
    const resident = new Set<Token>();
    for (const name of host.placeNames) {
      for (const token of host.place(name).tokens) {
        if (!consumed.has(token)) resident.add(token);
      }
    }
    const delivered = new Set<Token>();
    for (const [name, tokens] of staged) {
      for (const token of tokens) {
        if (delivered.has(token) || resident.has(token)) {
          throw new TokenAliasError(name, token.batchId);
        }
        delivered.add(token);
      }
    }

    for (const [name, tokens] of staged) {
      const target = host.place(name);
      if (target.capacity === null) continue;
      const after =
        target.count() - (selected.get(name)?.length ?? 0) + tokens.length;
      if (after > target.capacity) {
        throw new CapacityExceededError(name, target.capacity, after);
      }
    }

    for (const [place, tokens] of selected) {
      host.place(place).removeTokens(tokens);
    }
    for (const [place, tokens] of staged) {
      host.place(place).addTokens(tokens);
    }
    host.commitBatchIds(idsIssued);
    for (const [stat, by] of records) {
      host.record(stat, by);
    }

    this.firedCount++;
    return {
      ok: true,
      transition: this.name,
      consumed: copies,
      produced: copyTokens(staged),
    };
  }

  /** Same definition, same fire count; functions are shared. */
  clone(): Transition {
    const copy = new Transition(this.def);
    copy.firedCount = this.firedCount;
    return copy;
  }
}
