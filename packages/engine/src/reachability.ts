import type { PetriNet } from "./net.js";
import type { FireResult, Marking } from "./types.js";

export type GoalFn = (marking: Marking) => boolean;

export type SearchOptions = {
  /** Longest firing sequence explored. */
  maxDepth?: number;
  /** Stop after dequeuing this many states. Unbounded when omitted. */
  maxStates?: number;
};

type QueueEntry = { state: PetriNet; sequence: string[] };

export type SearchResult = {
  sequence: string[] | null;
  /** Marking of the state that satisfied the goal, when one did. */
  marking: Marking | null;
  visitedStates: number;
};

/**
 * Breadth-first search for a firing sequence that reaches a marking
 * satisfying `goal`. Every branch works on its own clone, so the cost grows
 * with branching factor to the power of depth: keep nets small and depths
 * shallow. The input net is never modified.
 */
export function searchSequence(
  net: PetriNet,
  goal: GoalFn,
  options: SearchOptions = {},
): SearchResult {
  const maxDepth = options.maxDepth ?? 8;
  const maxStates = options.maxStates ?? Infinity;
  let frontier: QueueEntry[] = [{ state: net.clone(), sequence: [] }];
  let visitedStates = 0;

  // Level by level: same order as a FIFO queue, one depth per pass
  while (frontier.length > 0) {
    const next: QueueEntry[] = [];
    for (const { state, sequence } of frontier) {
      if (visitedStates >= maxStates) return { sequence: null, marking: null, visitedStates };
      visitedStates++;

      const marking = state.statusSnapshot();
      if (goal(marking)) {
        return { sequence, marking, visitedStates };
      }
      if (sequence.length >= maxDepth) continue;

      for (const transition of state.getEnabledTransitions()) {
        const branch = state.clone();
        const result = branch.stepFire(transition.name);
        if (result.ok) {
          next.push({ state: branch, sequence: [...sequence, transition.name] });
        }
      }
    }
    frontier = next;
  }

  return { sequence: null, marking: null, visitedStates };
}

/** Shortest firing sequence within `maxDepth`, or null when none is found. */
export function findSequenceBfs(
  net: PetriNet,
  goal: GoalFn,
  options: SearchOptions = {},
): string[] | null {
  return searchSequence(net, goal, options).sequence;
}

/**
 * Fires `sequence` on a clone of `net`, stopping at the first rejection.
 * Rules that draw from the net's random source may take a different
 * branch than they did during the search.
 */
export function replaySequence(
  net: PetriNet,
  sequence: readonly string[],
): { net: PetriNet; results: FireResult[]; completed: boolean } {
  const copy = net.clone();
  const results: FireResult[] = [];
  for (const name of sequence) {
    const result = copy.stepFire(name);
    results.push(result);
    if (!result.ok) return { net: copy, results, completed: false };
  }
  return { net: copy, results, completed: true };
}
