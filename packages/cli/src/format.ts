import { formatMarking } from "@retort/engine";
import type { AutoRunReport, NetDefinition, SearchResult } from "@retort/engine";
import type { Goal, ReachOptions } from "./options.js";

const useColor =
  !process.env.NO_COLOR && process.stdout.isTTY;

const BOLD = useColor ? "\x1b[1m" : "";
const GREEN = useColor ? "\x1b[32m" : "";
const RED = useColor ? "\x1b[31m" : "";
const YELLOW = useColor ? "\x1b[33m" : "";
const CYAN = useColor ? "\x1b[36m" : "";
const DIM = useColor ? "\x1b[2m" : "";
const RESET = useColor ? "\x1b[0m" : "";

export function formatModelList(definitions: Iterable<NetDefinition<string>>): string {
  const lines = [`${BOLD}Models:${RESET}`];
  for (const def of definitions) {
    lines.push(
      `  ${CYAN}${def.name}${RESET} ${DIM}(${def.places.length} places, ${def.transitions.length} transitions)${RESET}`,
    );
  }
  return lines.join("\n");
}

/** Fired names collapsed into `name×n` per consecutive run. */
function collapseRuns(fired: readonly string[]): string {
  const runs: string[] = [];
  let current = "";
  let count = 0;
  for (const name of fired) {
    if (name === current) {
      count++;
      continue;
    }
    if (count > 0) runs.push(count === 1 ? current : `${current}×${count}`);
    current = name;
    count = 1;
  }
  if (count > 0) runs.push(count === 1 ? current : `${current}×${count}`);
  return runs.join(" ");
}

export function formatRunReport(report: AutoRunReport): string {
  const lines: string[] = [];

  lines.push(`${BOLD}Run:${RESET} ${report.steps} step(s), ${GREEN}${report.fired.length} fired${RESET}, ${report.rejections.length > 0 ? RED : DIM}${report.rejections.length} rejected${RESET}`);
  if (report.fired.length > 0) {
    lines.push(`  ${DIM}${collapseRuns(report.fired)}${RESET}`);
  }
  if (report.haltedAt !== null) {
    lines.push(`  ${YELLOW}Halted at step ${report.haltedAt}: no enabled transitions${RESET}`);
  }

  const byReason = new Map<string, number>();
  for (const rejection of report.rejections) {
    const key = `${rejection.transition} (${rejection.reason})`;
    byReason.set(key, (byReason.get(key) ?? 0) + 1);
  }
  for (const [key, count] of byReason) {
    lines.push(`  ${RED}✗${RESET} ${key} ×${count}`);
  }

  return lines.join("\n");
}

export function formatStats(stats: Record<string, number>): string {
  const entries = Object.entries(stats).sort(([a], [b]) => a.localeCompare(b));
  if (entries.length === 0) return `${BOLD}Stats:${RESET} ${DIM}(none)${RESET}`;
  const width = Math.max(...entries.map(([key]) => key.length));
  return [
    `${BOLD}Stats:${RESET}`,
    ...entries.map(([key, value]) => `  ${key.padEnd(width)}  ${value}`),
  ].join("\n");
}

export function formatGoal(goal: Goal): string {
  return goal.atLeast === 1 ? goal.place : `${goal.place}>=${goal.atLeast}`;
}

export function formatSearch(
  goal: Goal,
  bounds: Pick<ReachOptions, "maxDepth" | "maxStates">,
  result: SearchResult,
): string {
  const lines: string[] = [];
  if (result.sequence === null) {
    const capped = bounds.maxStates !== undefined && result.visitedStates >= bounds.maxStates;
    lines.push(`${RED}No sequence found within depth ${bounds.maxDepth}${RESET}`);
    if (capped) {
      lines.push(`  ${YELLOW}Stopped at the ${bounds.maxStates}-state bound${RESET}`);
    }
  } else if (result.sequence.length === 0) {
    lines.push(`${GREEN}Goal ${formatGoal(goal)} already holds${RESET}`);
  } else {
    lines.push(`${GREEN}Goal ${formatGoal(goal)} reached in ${result.sequence.length} firing(s):${RESET}`);
    lines.push(`  ${BOLD}${result.sequence.join(" → ")}${RESET}`);
  }
  if (result.marking) {
    lines.push(`  ${DIM}marking: ${formatMarking(result.marking)}${RESET}`);
  }
  lines.push(`  ${DIM}${result.visitedStates} state(s) visited${RESET}`);
  return lines.join("\n");
}
