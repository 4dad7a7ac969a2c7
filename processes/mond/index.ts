export { definition, definition as default } from "./definition.js";
export type { Place } from "./definition.js";
export {
  CONDENSER_CAPACITY,
  CO_PER_CARBONYL,
  MIN_CARBONYLATION_PURITY,
  ORE_PURITY,
  REFINED_PURITY,
} from "./definition.js";
