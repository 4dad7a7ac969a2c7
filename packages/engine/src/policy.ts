import type { Marking } from "./types.js";

export type DecisionRequest = {
  /** Names of the transitions that pass the count check, in net order. */
  enabled: readonly string[];
  marking: Marking;
  time: number;
  step: number;
};

/**
 * Chooses which enabled transition auto-run attempts next. Rule-based and
 * learning agents plug in here.
 */
export type Policy = {
  readonly name: string;
  choose(request: DecisionRequest, random: () => number): string;
};

export type PolicyName = "random" | "prioritise";

export function pickRandom<T>(items: readonly T[], random: () => number): T {
  const index = Math.min(Math.floor(random() * items.length), items.length - 1);
  const item = items[index];
  if (item === undefined) {
    throw new Error("Cannot pick from an empty list");
  }
  return item;
}

export const randomPolicy: Policy = {
  name: "random",
  choose: (request, random) => pickRandom(request.enabled, random),
};

/** First enabled name in `priority` order, uniform choice when none is enabled. */
export function prioritisePolicy(priority: readonly string[]): Policy {
  return {
    name: "prioritise",
    choose(request, random) {
      const enabled = new Set(request.enabled);
      return priority.find((name) => enabled.has(name)) ?? pickRandom(request.enabled, random);
    },
  };
}

export function resolvePolicy(
  policy: PolicyName | Policy,
  priority: readonly string[] = [],
): Policy {
  if (typeof policy !== "string") return policy;
  return policy === "prioritise" ? prioritisePolicy(priority) : randomPolicy;
}
