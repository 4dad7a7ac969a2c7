import { describe, it, expect } from "vitest";
import { createToken, defineNet, produce, transfer, type NetDefinition } from "@retort/engine";
import { listModels, lookupModel, reachModel, runModel } from "../src/commands.js";
import { UsageError } from "../src/options.js";

const tiny = defineNet<"feed" | "out">({
  name: "tiny",
  places: ["feed", "out"],
  transitions: [{ name: "move", inputs: { feed: 1 }, outputs: { out: transfer("feed") } }],
  initialMarking: { feed: [{ type: "water" }, { type: "water" }] },
  priority: ["move"],
});

const registry: ReadonlyMap<string, NetDefinition<string>> = new Map([["tiny", tiny]]);

function capture() {
  const lines: string[] = [];
  return { lines, out: { log: (line: string) => lines.push(line) } };
}

describe("lookupModel", () => {
  it("finds registered models", () => {
    expect(lookupModel("mond").name).toBe("mond");
  });

  it("names the available models on a miss", () => {
    expect(() => lookupModel("ghost", registry)).toThrow(
      new UsageError('Unknown model "ghost". Available: tiny'),
    );
  });
});

describe("listModels", () => {
  it("describes each model", () => {
    const { lines, out } = capture();
    listModels(out);
    expect(lines).toEqual(["Models:\n  mond (17 places, 14 transitions)"]);
  });
});

describe("runModel", () => {
  it("prints status, the run summary and stats", () => {
    const { lines, out } = capture();

    const report = runModel(tiny, { steps: 5, policy: "prioritise", verbose: false }, out);

    expect(report.fired).toEqual(["move", "move"]);
    expect(lines).toEqual([
      ["=== tiny status (grouped) ===", `${"feed".padEnd(20)}: water:2`, `${"out".padEnd(20)}: (empty)`].join("\n"),
      ["Run: 2 step(s), 2 fired, 0 rejected", "  move×2", "  Halted at step 2: no enabled transitions"].join("\n"),
      ["=== tiny status (grouped) ===", `${"feed".padEnd(20)}: (empty)`, `${"out".padEnd(20)}: water:2`].join("\n"),
      ["Stats:", "  fired::move  2"].join("\n"),
    ]);
  });

  it("routes verbose firing logs through the same sink", () => {
    const { lines, out } = capture();
    runModel(tiny, { steps: 1, policy: "random", verbose: true }, out);
    expect(lines[1]).toBe("[step 0] Fired move.");
  });
});

describe("reachModel", () => {
  it("prints the shortest sequence and the marking it reaches", () => {
    const { lines, out } = capture();

    const result = reachModel(tiny, { goal: "out>=2", maxDepth: 3 }, out);

    expect(result).toEqual({
      sequence: ["move", "move"],
      marking: { feed: 0, out: 2 },
      visitedStates: 3,
    });
    expect(lines).toEqual([
      ["Goal out>=2 reached in 2 firing(s):", "  move → move", "  marking: out:2", "  3 state(s) visited"].join("\n"),
    ]);
  });

  it("reports an unreachable goal", () => {
    const { lines, out } = capture();

    const result = reachModel(tiny, { goal: "out>=3", maxDepth: 5 }, out);

    expect(result.sequence).toBeNull();
    expect(lines).toEqual([["No sequence found within depth 5", "  3 state(s) visited"].join("\n")]);
  });

  it("stops at the state bound", () => {
    const { lines, out } = capture();

    const result = reachModel(tiny, { goal: "out>=2", maxDepth: 3, maxStates: 2 }, out);

    expect(result.sequence).toBeNull();
    expect(lines).toEqual([
      ["No sequence found within depth 3", "  Stopped at the 2-state bound", "  2 state(s) visited"].join("\n"),
    ]);
  });

  it("prints the marking the search reached, not a fresh replay", () => {
    const router = defineNet<"a" | "X" | "Y">({
      name: "router",
      places: ["a", "X", "Y"],
      transitions: [
        {
          name: "route",
          inputs: { a: 1 },
          outputs: {
            X: produce((_consumed, ctx) => {
              ctx.emit(ctx.random() < 0.5 ? "X" : "Y", createToken({ type: "t" }));
            }),
          },
        },
      ],
      initialMarking: { a: [{ type: "t" }] },
    });
    let draws = 0;
    const random = () => (draws++ % 2 === 0 ? 0.1 : 0.9);
    const { lines, out } = capture();

    reachModel(router, { goal: "X", maxDepth: 2 }, { ...out, random });

    expect(lines).toEqual([
      ["Goal X reached in 1 firing(s):", "  route", "  marking: X:1", "  2 state(s) visited"].join("\n"),
    ]);
  });

  it("rejects goals on unknown places", () => {
    const { out } = capture();
    expect(() => reachModel(tiny, { goal: "tank", maxDepth: 3 }, out)).toThrow(
      'Unknown place "tank" in model "tiny"',
    );
  });

  it("finds the Mond preparation chain", () => {
    const { out } = capture();
    const result = reachModel(lookupModel("mond"), { goal: "P_impure_Ni", maxDepth: 3 }, out);
    expect(result.sequence).toEqual(["T2", "T3", "T4"]);
  });
});
