import { z } from "zod";

/** Bad command-line input: printed without a stack trace. */
export class UsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "UsageError";
  }
}

const FLAGS: Record<string, string> = {
  steps: "--steps",
  policy: "--policy",
  maxDepth: "--max-depth",
  maxStates: "--max-states",
  goal: "--goal",
};

const runOptionsSchema = z.object({
  steps: z.coerce.number().int().positive(),
  policy: z.enum(["random", "prioritise"]),
  verbose: z.boolean(),
});

const reachOptionsSchema = z.object({
  goal: z.string().regex(/^[A-Za-z_][\w-]*(>=\d+)?$/, "expected <place> or <place>>=<n>"),
  maxDepth: z.coerce.number().int().positive(),
  maxStates: z.coerce.number().int().positive().optional(),
});

export type RunOptions = z.infer<typeof runOptionsSchema>;
export type ReachOptions = z.infer<typeof reachOptionsSchema>;

export type Goal = { place: string; atLeast: number };

export const DEFAULT_STEPS = 50;
export const DEFAULT_MAX_DEPTH = 8;

function validate<S extends z.ZodTypeAny>(schema: S, input: unknown): z.infer<S> {
  const parsed = schema.safeParse(input);
  if (!parsed.success) {
    const problems = parsed.error.issues.map((issue) => {
      const key = String(issue.path[0] ?? "");
      return `${FLAGS[key] ?? key}: ${issue.message}`;
    });
    throw new UsageError(problems.join("; "));
  }
  return parsed.data;
}

/** Value following `flag`, or undefined when the flag is absent. */
export function flagValue(args: readonly string[], flag: string): string | undefined {
  const index = args.indexOf(flag);
  if (index === -1) return undefined;
  const value = args[index + 1];
  if (value === undefined || value.startsWith("--")) {
    throw new UsageError(`${flag} requires a value`);
  }
  return value;
}

/** Flags win over RETORT_STEPS / RETORT_POLICY, which win over defaults. */
export function parseRunOptions(
  args: readonly string[],
  env: NodeJS.ProcessEnv = process.env,
): RunOptions {
  return validate(runOptionsSchema, {
    steps: flagValue(args, "--steps") ?? env.RETORT_STEPS ?? DEFAULT_STEPS,
    policy: flagValue(args, "--policy") ?? env.RETORT_POLICY ?? "random",
    verbose: args.includes("--verbose"),
  });
}

export function parseReachOptions(args: readonly string[]): ReachOptions {
  const goal = flagValue(args, "--goal");
  if (goal === undefined) {
    throw new UsageError("--goal is required");
  }
  return validate(reachOptionsSchema, {
    goal,
    maxDepth: flagValue(args, "--max-depth") ?? DEFAULT_MAX_DEPTH,
    maxStates: flagValue(args, "--max-states"),
  });
}

/** `place` means at least one token, `place>=n` at least n. */
export function parseGoal(goal: string): Goal {
  const [place = "", atLeast] = goal.split(">=");
  return { place, atLeast: atLeast === undefined ? 1 : Number(atLeast) };
}
