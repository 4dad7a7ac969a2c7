import {
  CapacityExceededError,
  DuplicateNameError,
  UnknownPlaceError,
  UnknownTransitionError,
} from "./errors.js";
import { PetriNet, type NetOptions } from "./net.js";
import { Place } from "./place.js";
import { createToken } from "./token.js";
import { Transition } from "./transition.js";
import type { InputArc, OutputRule, TokenInit, TransitionDef } from "./types.js";

type ByPlace<Place extends string, V> = { [K in Place]?: V };

export type PlaceConfig<Place extends string> =
  | Place
  | { name: Place; capacity?: number };

/** A transition whose arcs may only name the net's places. */
export type TransitionConfig<Place extends string> = Omit<
  TransitionDef,
  "inputs" | "outputs"
> & {
  inputs?: ByPlace<Place, number | InputArc>;
  outputs?: ByPlace<Place, OutputRule>;
};

export type NetDefinition<Place extends string> = {
  name: string;
  places: Place[];
  transitions: TransitionDef[];
  /** Default priority list for the prioritise policy. */
  priority: string[];
  /** Fresh net with the initial marking seeded. Call again to reset. */
  build(options?: Omit<NetOptions, "name">): PetriNet;
};

function compact<V>(map: { [key: string]: V | undefined } | undefined): Record<string, V> {
  const out: Record<string, V> = {};
  for (const [key, value] of Object.entries(map ?? {})) {
    if (value !== undefined) out[key] = value;
  }
  return out;
}

/**
 * Defines a net, validating that every arc, initial-marking entry and
 * priority name references something declared.
 */
export function defineNet<Place extends string>(def: {
  name: string;
  places: PlaceConfig<Place>[];
  transitions: TransitionConfig<Place>[];
  initialMarking?: ByPlace<Place, TokenInit[]>;
  priority?: string[];
}): NetDefinition<Place> {
  const places = def.places.map((p) => (typeof p === "string" ? { name: p } : p));
  const capacities = new Map<string, number | undefined>();
  for (const p of places) {
    if (capacities.has(p.name)) {
      throw new DuplicateNameError("place", p.name);
    }
    capacities.set(p.name, p.capacity);
  }

  const transitions: TransitionDef[] = def.transitions.map((t) => ({
    ...t,
    inputs: compact<number | InputArc>(t.inputs),
    outputs: compact<OutputRule>(t.outputs),
  }));

  const transitionNames = new Set<string>();
  for (const t of transitions) {
    if (transitionNames.has(t.name)) {
      throw new DuplicateNameError("transition", t.name);
    }
    transitionNames.add(t.name);

    // Validates weights, transfer sources and guard expressions
    const compiled = new Transition(t);
    for (const p of compiled.inputs.keys()) {
      if (!capacities.has(p)) {
        throw new UnknownPlaceError(p, `Transition "${t.name}" input`);
      }
    }
    for (const p of compiled.outputs.keys()) {
      if (!capacities.has(p)) {
        throw new UnknownPlaceError(p, `Transition "${t.name}" output`);
      }
    }
  }

  const initialMarking = compact<TokenInit[]>(def.initialMarking);
  for (const [p, tokens] of Object.entries(initialMarking)) {
    if (!capacities.has(p)) {
      throw new UnknownPlaceError(p, "Initial marking");
    }
    const capacity = capacities.get(p);
    if (capacity !== undefined && tokens.length > capacity) {
      throw new CapacityExceededError(p, capacity, tokens.length);
    }
  }

  const priority = def.priority ?? [];
  for (const name of priority) {
    if (!transitionNames.has(name)) {
      throw new UnknownTransitionError(name, "Priority list");
    }
  }

  return {
    name: def.name,
    places: places.map((p) => p.name),
    transitions,
    priority,
    build(options = {}) {
      const net = new PetriNet({ ...options, name: def.name });
      for (const p of places) {
        net.addPlace(
          new Place(p.name, p.capacity === undefined ? {} : { capacity: p.capacity }),
        );
      }
      for (const [p, tokens] of Object.entries(initialMarking)) {
        net.place(p).addTokens(tokens.map(createToken));
      }
      for (const t of transitions) {
        net.addTransition(new Transition(t));
      }
      return net;
    },
  };
}
