import { describe, it, expect } from "vitest";
import {
  flagValue,
  parseGoal,
  parseReachOptions,
  parseRunOptions,
  UsageError,
} from "../src/options.js";

describe("parseRunOptions", () => {
  it("falls back to defaults", () => {
    expect(parseRunOptions(["run", "mond"], {})).toEqual({
      steps: 50,
      policy: "random",
      verbose: false,
    });
  });

  it("reads defaults from the environment", () => {
    const env = { RETORT_STEPS: "12", RETORT_POLICY: "prioritise" };
    expect(parseRunOptions(["run", "mond"], env)).toEqual({
      steps: 12,
      policy: "prioritise",
      verbose: false,
    });
  });

  it("prefers flags over the environment", () => {
    const args = ["run", "mond", "--steps", "3", "--policy", "random", "--verbose"];
    expect(parseRunOptions(args, { RETORT_STEPS: "12", RETORT_POLICY: "prioritise" })).toEqual({
      steps: 3,
      policy: "random",
      verbose: true,
    });
  });

  it("rejects a non-positive step count", () => {
    expect(() => parseRunOptions(["--steps", "0"], {})).toThrow(UsageError);
    expect(() => parseRunOptions(["--steps", "0"], {})).toThrow("--steps:");
  });

  it("rejects an unknown policy", () => {
    expect(() => parseRunOptions(["--policy", "greedy"], {})).toThrow("--policy:");
  });

  it("rejects a flag without a value", () => {
    expect(() => parseRunOptions(["run", "mond", "--steps"], {})).toThrow("--steps requires a value");
  });
});

describe("parseReachOptions", () => {
  it("defaults the depth", () => {
    expect(parseReachOptions(["reach", "mond", "--goal", "P_storage>=2"])).toEqual({
      goal: "P_storage>=2",
      maxDepth: 8,
    });
  });

  it("takes an explicit depth", () => {
    expect(parseReachOptions(["--goal", "P_storage", "--max-depth", "4"]).maxDepth).toBe(4);
  });

  it("takes a state bound", () => {
    expect(parseReachOptions(["--goal", "P_storage", "--max-states", "100"]).maxStates).toBe(100);
    expect(parseReachOptions(["--goal", "P_storage"]).maxStates).toBeUndefined();
  });

  it("rejects a non-positive state bound", () => {
    expect(() => parseReachOptions(["--goal", "P_storage", "--max-states", "0"])).toThrow("--max-states:");
  });

  it("requires a goal", () => {
    expect(() => parseReachOptions(["reach", "mond"])).toThrow("--goal is required");
  });

  it("rejects a malformed goal", () => {
    expect(() => parseReachOptions(["--goal", "a>b"])).toThrow("--goal:");
  });
});

describe("flagValue", () => {
  it("returns undefined for an absent flag", () => {
    expect(flagValue(["run"], "--steps")).toBeUndefined();
  });

  it("does not take the next flag as a value", () => {
    expect(() => flagValue(["--steps", "--verbose"], "--steps")).toThrow(UsageError);
  });
});

describe("parseGoal", () => {
  it("defaults to one token", () => {
    expect(parseGoal("P_storage")).toEqual({ place: "P_storage", atLeast: 1 });
  });

  it("reads a threshold", () => {
    expect(parseGoal("P_storage>=3")).toEqual({ place: "P_storage", atLeast: 3 });
  });
});
