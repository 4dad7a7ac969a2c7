import type { NetDefinition } from "@retort/engine";
import { definition as mond } from "./mond/index.js";

export { mond };

/** Process models by the name the CLI accepts. */
export const processes: ReadonlyMap<string, NetDefinition<string>> = new Map([
  ["mond", mond],
]);
