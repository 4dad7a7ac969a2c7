import { compileExpression, useDotAccessOperator } from "filtrex";
import { GuardEvaluationError } from "./errors.js";
import type { GuardFn, SelectedTokens, Token } from "./types.js";

type SelectionSummary = {
  count: number;
  mass: number;
  type: string;
  minPurity?: number;
  maxPurity?: number;
  minTemperature?: number;
  maxTemperature?: number;
  maxAge: number;
};

function extremes(values: (number | null)[]): { min: number; max: number } | null {
  const known = values.filter((v): v is number => v !== null);
  if (known.length === 0) return null;
  return { min: Math.min(...known), max: Math.max(...known) };
}

function summarise(tokens: readonly Token[]): SelectionSummary {
  const summary: SelectionSummary = {
    count: tokens.length,
    mass: tokens.reduce((sum, t) => sum + t.mass, 0),
    type: tokens[0]?.type ?? "",
    maxAge: tokens.reduce((max, t) => Math.max(max, t.age), 0),
  };
  const purity = extremes(tokens.map((t) => t.purity));
  if (purity) {
    summary.minPurity = purity.min;
    summary.maxPurity = purity.max;
  }
  const temperature = extremes(tokens.map((t) => t.temperature));
  if (temperature) {
    summary.minTemperature = temperature.min;
    summary.maxTemperature = temperature.max;
  }
  return summary;
}

// Cloned nets rebuild their transitions; expressions are compiled once.
const compiled = new Map<string, ReturnType<typeof compileExpression>>();

/**
 * Compiles a filtrex expression into a guard. The expression sees
 * `marking.<place>` counts, the net's `time`, and per input place
 * `selected.<place>` summaries of the tokens picked for the firing.
 */
export function compileGuard(expr: string, transition = "<anonymous>"): GuardFn {
  let fn = compiled.get(expr);
  if (!fn) {
    fn = compileExpression(expr, { customProp: useDotAccessOperator });
    compiled.set(expr, fn);
  }
  const evaluate = fn;
  return (view, selected: SelectedTokens) => {
    const summaries: Record<string, SelectionSummary> = {};
    for (const [place, tokens] of selected) {
      summaries[place] = summarise(tokens);
    }
    let result: unknown;
    try {
      result = evaluate({ marking: view.statusSnapshot(), time: view.time, selected: summaries });
    } catch (err) {
      throw new GuardEvaluationError(transition, expr, err);
    }
    // filtrex hands runtime failures back as values
    if (result instanceof Error) {
      throw new GuardEvaluationError(transition, expr, result);
    }
    return Boolean(result);
  };
}
