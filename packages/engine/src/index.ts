// Types
export type {
  Marking,
  Token,
  TokenInit,
  TokenPredicate,
  SelectedTokens,
  NetView,
  Guard,
  GuardFn,
  InputArc,
  OutputRule,
  ProductionContext,
  TokenFactory,
  ProduceFn,
  TransitionDef,
  RejectionReason,
  FireResult,
} from "./types.js";

// Errors
export {
  CapacityExceededError,
  TokenNotFoundError,
  TokenAliasError,
  UnknownPlaceError,
  UnknownTransitionError,
  DuplicateNameError,
  InvalidTokenError,
  GuardEvaluationError,
} from "./errors.js";

// Tokens and places
export { createToken, deriveToken, cloneToken, formatToken, randomBatchId } from "./token.js";
export { Place } from "./place.js";
export type { PlaceOptions } from "./place.js";

// Transitions and production rules
export { Transition } from "./transition.js";
export type { FiringHost } from "./transition.js";
export { emit, transfer, produce } from "./rules.js";
export { compileGuard } from "./guard.js";

// Net
export { PetriNet } from "./net.js";
export type { NetOptions, AutoRunOptions, AutoRunReport, Rejection } from "./net.js";
export { randomPolicy, prioritisePolicy, resolvePolicy, pickRandom } from "./policy.js";
export type { Policy, PolicyName, DecisionRequest } from "./policy.js";

// Definitions
export { defineNet } from "./definition.js";
export type { NetDefinition, PlaceConfig, TransitionConfig } from "./definition.js";

// Reachability
export { findSequenceBfs, searchSequence, replaySequence } from "./reachability.js";
export type { GoalFn, SearchOptions, SearchResult } from "./reachability.js";

// Formatting
export { formatMarking, formatStatus } from "./format.js";
