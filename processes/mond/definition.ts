import {
  createToken,
  defineNet,
  deriveToken,
  emit,
  produce,
  transfer,
  type TokenInit,
} from "@retort/engine";

export type Place =
  | "P_feed_ore"
  | "P_crush"
  | "P_leach"
  | "P_concentrate"
  | "P_impure_Ni"
  | "P_CO_feed"
  | "P_carbonylation"
  | "P_NiCO4_gas"
  | "P_condenser"
  | "P_transfer_to_decomp"
  | "P_decomposer"
  | "P_pure_Ni"
  | "P_CO_recycle"
  | "P_scrubber"
  | "P_offgas"
  | "P_quality_check"
  | "P_storage";

export const CONDENSER_CAPACITY = 5;
export const ORE_PURITY = 0.6;
export const MIN_CARBONYLATION_PURITY = 0.5;
export const REFINED_PURITY = 0.99;
/** CO molecules per Ni(CO)4 */
export const CO_PER_CARBONYL = 4;

const ore: TokenInit[] = Array.from({ length: 10 }, (_, i) => ({
  type: "Ni_ore",
  batchId: `ORE${String(i + 1).padStart(3, "0")}`,
  purity: ORE_PURITY,
}));

const carbonMonoxide: TokenInit[] = Array.from({ length: 40 }, (_, i) => ({
  type: "CO",
  batchId: `CO${String(i + 1).padStart(3, "0")}`,
}));

export const definition = defineNet<Place>({
  name: "mond",
  places: [
    "P_feed_ore",
    "P_crush",
    "P_leach",
    "P_concentrate",
    "P_impure_Ni",
    "P_CO_feed",
    "P_carbonylation",
    "P_NiCO4_gas",
    { name: "P_condenser", capacity: CONDENSER_CAPACITY },
    "P_transfer_to_decomp",
    "P_decomposer",
    "P_pure_Ni",
    "P_CO_recycle",
    "P_scrubber",
    "P_offgas",
    "P_quality_check",
    "P_storage",
  ],
  transitions: [
    {
      name: "T1",
      description: "Receive ore (external).",
      outputs: {
        P_feed_ore: emit(1, (ctx) =>
          createToken({ type: "Ni_ore", batchId: `ORE-${ctx.nextBatchId()}`, purity: ORE_PURITY }),
        ),
      },
    },
    {
      name: "T2",
      description: "Crush/grind.",
      inputs: { P_feed_ore: 1 },
      outputs: { P_crush: transfer("P_feed_ore", (t) => deriveToken(t, { type: "Ni_crushed" })) },
    },
    {
      name: "T3",
      description: "Leach/concentrate.",
      inputs: { P_crush: 1 },
      outputs: { P_concentrate: transfer("P_crush", (t) => deriveToken(t, { type: "Ni_concentrate" })) },
    },
    {
      name: "T4",
      description: "Prepare impure Ni feed.",
      inputs: { P_concentrate: 1 },
      outputs: { P_impure_Ni: transfer("P_concentrate", (t) => deriveToken(t, { type: "Ni_impure" })) },
    },
    {
      name: "T5",
      description: "Introduce/replenish CO (external).",
      outputs: {
        P_CO_feed: emit(CO_PER_CARBONYL, (ctx) =>
          createToken({ type: "CO", batchId: `CO-${ctx.nextBatchId()}` }),
        ),
      },
    },
    {
      name: "T6",
      description: "Carbonylation: Ni + 4 CO -> Ni(CO)4.",
      inputs: { P_impure_Ni: 1, P_CO_feed: CO_PER_CARBONYL },
      outputs: {
        P_NiCO4_gas: produce((consumed, ctx) => {
          const nickel = consumed.get("P_impure_Ni")?.[0];
          return createToken({
            type: "NiCO4",
            batchId: `NC-${ctx.nextBatchId()}`,
            mass: nickel?.mass ?? 1,
            temperature: 25,
          });
        }),
      },
      guard: (_view, selected) => {
        const nickel = selected.get("P_impure_Ni")?.[0];
        if (!nickel) return false;
        return nickel.purity === null || nickel.purity >= MIN_CARBONYLATION_PURITY;
      },
    },
    {
      name: "T7",
      description: "Transfer to condenser.",
      inputs: { P_NiCO4_gas: 1 },
      outputs: { P_condenser: transfer("P_NiCO4_gas") },
      guard: `marking.P_condenser < ${CONDENSER_CAPACITY}`,
    },
    {
      name: "T8",
      description: "Condense/collect Ni(CO)4.",
      inputs: { P_condenser: 1 },
      outputs: { P_transfer_to_decomp: transfer("P_condenser") },
    },
    {
      name: "T9",
      description: "Transfer to decomposer.",
      inputs: { P_transfer_to_decomp: 1 },
      outputs: { P_decomposer: transfer("P_transfer_to_decomp") },
    },
    {
      name: "T10",
      description: "Decomposition: Ni(CO)4 -> Ni + 4 CO.",
      inputs: { P_decomposer: 1 },
      outputs: {
        P_pure_Ni: produce((consumed, ctx) => {
          for (const carbonyl of consumed.get("P_decomposer") ?? []) {
            ctx.emit(
              "P_pure_Ni",
              createToken({
                type: "Ni_pure",
                batchId: `NP-${ctx.nextBatchId()}`,
                mass: carbonyl.mass,
                purity: REFINED_PURITY,
                temperature: 25,
              }),
            );
            ctx.emit(
              "P_CO_recycle",
              Array.from({ length: CO_PER_CARBONYL }, () =>
                createToken({ type: "CO", batchId: `RCO-${ctx.nextBatchId()}` }),
              ),
            );
          }
        }),
      },
      guard: "selected.P_decomposer.count >= 1",
    },
    {
      name: "T11",
      description: "CO recycle to feed.",
      inputs: { P_CO_recycle: 1 },
      outputs: { P_CO_feed: transfer("P_CO_recycle") },
    },
    {
      name: "T12",
      description: "Quality check (probabilistic).",
      inputs: { P_pure_Ni: 1 },
      outputs: {
        P_storage: produce((consumed, ctx) => {
          for (const nickel of consumed.get("P_pure_Ni") ?? []) {
            const passProbability = nickel.purity ?? 0.95;
            if (ctx.random() <= passProbability) {
              ctx.emit("P_storage", deriveToken(nickel));
              ctx.record("qc_passed");
            } else {
              ctx.emit("P_scrubber", deriveToken(nickel));
              ctx.record("qc_failed");
            }
          }
        }),
      },
    },
    {
      name: "T13",
      description: "Scrap/waste handling.",
      inputs: { P_scrubber: 1 },
      outputs: { P_offgas: transfer("P_scrubber") },
    },
    {
      name: "T14",
      description: "Emergency vent: route gas to scrubber.",
      inputs: { P_NiCO4_gas: 1 },
      outputs: { P_scrubber: transfer("P_NiCO4_gas") },
    },
  ],
  initialMarking: {
    P_feed_ore: ore,
    P_CO_feed: carbonMonoxide,
  },
  priority: ["T6", "T10", "T11", "T8", "T7"],
});

export default definition;
