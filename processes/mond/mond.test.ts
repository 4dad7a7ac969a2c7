import { describe, it, expect } from "vitest";
import { createToken, findSequenceBfs } from "@retort/engine";
import { definition, CONDENSER_CAPACITY } from "./index.js";

function fireAll(net: ReturnType<typeof definition.build>, names: string[]) {
  for (const name of names) {
    const result = net.stepFire(name);
    expect(result.ok, `${name} should fire`).toBe(true);
  }
}

describe("mond process", () => {
  it("seeds ore and CO feed", () => {
    const snapshot = definition.build().statusSnapshot();
    expect(snapshot.P_feed_ore).toBe(10);
    expect(snapshot.P_CO_feed).toBe(40);
    expect(Object.values(snapshot).reduce((a, b) => a + b, 0)).toBe(50);
  });

  it("starts with intake, crushing and CO replenishment enabled", () => {
    const net = definition.build();
    expect(net.getEnabledTransitions().map((t) => t.name)).toEqual(["T1", "T2", "T5"]);
  });

  it("carries ore identity and purity through preparation", () => {
    const net = definition.build();
    fireAll(net, ["T2", "T3", "T4"]);

    const [impure] = net.place("P_impure_Ni").tokens;
    expect(impure!.type).toBe("Ni_impure");
    expect(impure!.batchId).toBe("ORE001");
    expect(impure!.purity).toBe(0.6);
  });

  it("carbonylation consumes one nickel and four CO", () => {
    const net = definition.build();
    fireAll(net, ["T2", "T3", "T4", "T6"]);

    expect(net.place("P_impure_Ni").count()).toBe(0);
    expect(net.place("P_CO_feed").count()).toBe(36);
    const [carbonyl] = net.place("P_NiCO4_gas").tokens;
    expect(carbonyl!.type).toBe("NiCO4");
    expect(carbonyl!.batchId).toBe("NC-0001");
    expect(carbonyl!.temperature).toBe(25);
  });

  it("carbonylation refuses low-purity nickel", () => {
    const net = definition.build();
    net.place("P_impure_Ni").addTokens(createToken({ type: "Ni_impure", purity: 0.3 }));

    const result = net.stepFire("T6");

    expect(result.ok).toBe(false);
    if (!result.ok) expect(result.reason).toBe("guard-blocked");
    expect(net.place("P_CO_feed").count()).toBe(40);
  });

  it("decomposition yields pure nickel and recycles four CO", () => {
    const net = definition.build();
    fireAll(net, ["T2", "T3", "T4", "T6", "T7", "T8", "T9", "T10"]);

    const [nickel] = net.place("P_pure_Ni").tokens;
    expect(nickel!.batchId).toBe("NP-0002");
    expect(nickel!.purity).toBe(0.99);
    expect(net.place("P_CO_recycle").tokens.map((t) => t.batchId)).toEqual([
      "RCO-0003",
      "RCO-0004",
      "RCO-0005",
      "RCO-0006",
    ]);

    fireAll(net, ["T11", "T11", "T11", "T11"]);
    expect(net.place("P_CO_feed").count()).toBe(40);
  });

  it("quality check routes by purity", () => {
    const pass = definition.build({ random: () => 0.5 });
    fireAll(pass, ["T2", "T3", "T4", "T6", "T7", "T8", "T9", "T10", "T12"]);
    expect(pass.place("P_storage").count()).toBe(1);
    expect(pass.stats().qc_passed).toBe(1);

    const fail = definition.build({ random: () => 0.995 });
    fireAll(fail, ["T2", "T3", "T4", "T6", "T7", "T8", "T9", "T10", "T12"]);
    expect(fail.place("P_storage").count()).toBe(0);
    expect(fail.place("P_scrubber").count()).toBe(1);
    expect(fail.stats().qc_failed).toBe(1);
  });

  it("transfer to the condenser waits for room", () => {
    const net = definition.build();
    net.place("P_condenser").addTokens(
      Array.from({ length: CONDENSER_CAPACITY }, () => createToken({ type: "NiCO4" })),
    );
    net.place("P_NiCO4_gas").addTokens(createToken({ type: "NiCO4" }));

    const result = net.stepFire("T7");

    expect(result.ok).toBe(false);
    if (!result.ok) expect(result.reason).toBe("guard-blocked");
    expect(net.place("P_NiCO4_gas").count()).toBe(1);
  });

  it("keeps the condenser within capacity across a prioritised run", () => {
    let seed = 7;
    const random = () => {
      seed = (seed * 16807) % 2147483647;
      return seed / 2147483647;
    };
    const net = definition.build({ random });
    for (let step = 0; step < 200; step++) {
      net.autoRun({ steps: 1, policy: "prioritise", priority: definition.priority });
      expect(net.place("P_condenser").count()).toBeLessThanOrEqual(CONDENSER_CAPACITY);
    }
    expect(net.time).toBe(200);
    expect(net.stats()["fired::T6"]).toBeGreaterThan(0);
  });

  it("finds the preparation sequence by search", () => {
    const net = definition.build();
    const goal = (m: Record<string, number>) => (m.P_impure_Ni ?? 0) >= 1;

    expect(findSequenceBfs(net, goal, { maxDepth: 2 })).toBeNull();
    expect(findSequenceBfs(net, goal, { maxDepth: 3 })).toEqual(["T2", "T3", "T4"]);
  });
});
