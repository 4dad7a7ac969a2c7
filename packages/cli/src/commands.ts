import { searchSequence } from "@retort/engine";
import type { AutoRunReport, NetDefinition, SearchResult } from "@retort/engine";
import { processes } from "@retort/processes";
import {
  formatModelList,
  formatRunReport,
  formatSearch,
  formatStats,
} from "./format.js";
import { parseGoal, UsageError, type ReachOptions, type RunOptions } from "./options.js";

export type Output = {
  log: (line: string) => void;
  /** Random source handed to the net. Defaults to Math.random. */
  random?: () => number;
};

export function lookupModel(
  name: string,
  registry: ReadonlyMap<string, NetDefinition<string>> = processes,
): NetDefinition<string> {
  const definition = registry.get(name);
  if (!definition) {
    throw new UsageError(
      `Unknown model "${name}". Available: ${[...registry.keys()].join(", ")}`,
    );
  }
  return definition;
}

export function listModels(
  out: Output,
  registry: ReadonlyMap<string, NetDefinition<string>> = processes,
): void {
  out.log(formatModelList(registry.values()));
}

export function runModel(
  definition: NetDefinition<string>,
  options: RunOptions,
  out: Output,
): AutoRunReport {
  const net = definition.build({
    log: out.log,
    ...(out.random ? { random: out.random } : {}),
  });

  net.printStatus();
  const report = net.autoRun({
    steps: options.steps,
    policy: options.policy,
    priority: definition.priority,
    verbose: options.verbose,
  });
  out.log(formatRunReport(report));
  net.printStatus();
  out.log(formatStats(net.stats()));
  return report;
}

export function reachModel(
  definition: NetDefinition<string>,
  options: ReachOptions,
  out: Output,
): SearchResult {
  const goal = parseGoal(options.goal);
  if (!definition.places.includes(goal.place)) {
    throw new UsageError(`Unknown place "${goal.place}" in model "${definition.name}"`);
  }

  const net = definition.build(out.random ? { random: out.random } : {});
  const result = searchSequence(
    net,
    (marking) => (marking[goal.place] ?? 0) >= goal.atLeast,
    { maxDepth: options.maxDepth, maxStates: options.maxStates },
  );

  out.log(formatSearch(goal, options, result));
  return result;
}
