import {
  DuplicateNameError,
  UnknownPlaceError,
  UnknownTransitionError,
} from "./errors.js";
import { formatStatus } from "./format.js";
import type { Place } from "./place.js";
import { resolvePolicy, type Policy, type PolicyName } from "./policy.js";
import { cloneToken } from "./token.js";
import type { FiringHost, Transition } from "./transition.js";
import type {
  FireResult,
  Marking,
  NetView,
  RejectionReason,
  Token,
} from "./types.js";

export type NetOptions = {
  name?: string;
  /** Source of uniform numbers in [0, 1). Defaults to Math.random. */
  random?: () => number;
  /** Sink for verbose run output and printStatus. Defaults to console.log. */
  log?: (line: string) => void;
};

export type AutoRunOptions = {
  steps?: number;
  policy?: PolicyName | Policy;
  /** Transition names in descending priority, for the prioritise policy. */
  priority?: readonly string[];
  verbose?: boolean;
};

export type Rejection = {
  step: number;
  transition: string;
  reason: RejectionReason;
  detail: string;
};

export type AutoRunReport = {
  /** Iterations actually run. */
  steps: number;
  fired: string[];
  rejections: Rejection[];
  /** Step at which the run found no enabled transition, if it did. */
  haltedAt: number | null;
};

/** Guard-facing facade: answers questions, hands out copies. */
class ReadOnlyView implements NetView {
  constructor(private readonly net: PetriNet) {}

  get time(): number {
    return this.net.time;
  }

  statusSnapshot(): Marking {
    return this.net.statusSnapshot();
  }

  tokensIn(place: string): readonly Token[] {
    return this.net.tokensIn(place);
  }

  countIn(place: string, type?: string): number {
    return this.net.countIn(place, type);
  }

  massIn(place: string, type?: string): number {
    return this.net.massIn(place, type);
  }
}

export class PetriNet implements NetView, FiringHost {
  readonly name: string;
  readonly view: NetView;
  private readonly options: NetOptions;
  private readonly places = new Map<string, Place>();
  private readonly transitions = new Map<string, Transition>();
  private readonly counters = new Map<string, number>();
  private clock = 0;
  private batchCounter = 0;

  constructor(options: NetOptions = {}) {
    this.options = options;
    this.name = options.name ?? "net";
    this.view = new ReadOnlyView(this);
  }

  get time(): number {
    return this.clock;
  }

  get placeNames(): string[] {
    return [...this.places.keys()];
  }

  get transitionNames(): string[] {
    return [...this.transitions.keys()];
  }

  addPlace(place: Place): void {
    if (this.places.has(place.name)) {
      throw new DuplicateNameError("place", place.name);
    }
    this.places.set(place.name, place);
  }

  addTransition(transition: Transition): void {
    if (this.transitions.has(transition.name)) {
      throw new DuplicateNameError("transition", transition.name);
    }
    for (const place of transition.referencedPlaces()) {
      if (!this.places.has(place)) {
        throw new UnknownPlaceError(place, `Transition "${transition.name}"`);
      }
    }
    this.transitions.set(transition.name, transition);
  }

  place(name: string): Place {
    const place = this.places.get(name);
    if (!place) throw new UnknownPlaceError(name);
    return place;
  }

  transition(name: string): Transition {
    const transition = this.transitions.get(name);
    if (!transition) throw new UnknownTransitionError(name);
    return transition;
  }

  tokensIn(place: string): readonly Token[] {
    return this.place(place).tokens.map(cloneToken);
  }

  countIn(place: string, type?: string): number {
    return this.place(place).count(type);
  }

  massIn(place: string, type?: string): number {
    return this.place(place).mass(type);
  }

  random(): number {
    return (this.options.random ?? Math.random)();
  }

  nextBatchId(): string {
    const id = this.previewBatchId(1);
    this.commitBatchIds(1);
    return id;
  }

  previewBatchId(ahead: number): string {
    return String(this.batchCounter + ahead).padStart(4, "0");
  }

  commitBatchIds(count: number): void {
    this.batchCounter += count;
  }

  record(stat: string, by = 1): void {
    this.counters.set(stat, (this.counters.get(stat) ?? 0) + by);
  }

  stats(): Record<string, number> {
    return Object.fromEntries(this.counters);
  }

  isEnabled(name: string): boolean {
    return this.transition(name).isEnabled(this);
  }

  /** Transitions passing the count check. Guards are not evaluated. */
  getEnabledTransitions(): Transition[] {
    return [...this.transitions.values()].filter((t) => t.isEnabled(this));
  }

  stepFire(name: string): FireResult {
    const result = this.transition(name).fire(this);
    if (result.ok) {
      this.record(`fired::${name}`);
    }
    return result;
  }

  /** Advances the logical clock and the age of every resident token. */
  tick(dt = 1): void {
    this.clock += dt;
    for (const place of this.places.values()) {
      place.age(dt);
    }
  }

  autoRun(options: AutoRunOptions = {}): AutoRunReport {
    const steps = options.steps ?? 50;
    const verbose = options.verbose ?? false;
    const policy = resolvePolicy(options.policy ?? "random", options.priority);
    const report: AutoRunReport = { steps: 0, fired: [], rejections: [], haltedAt: null };

    for (let step = 0; step < steps; step++) {
      const enabled = this.getEnabledTransitions().map((t) => t.name);
      if (enabled.length === 0) {
        if (verbose) {
          this.log(`[time ${this.clock}] No enabled transitions. Halting at step ${step}.`);
        }
        report.haltedAt = step;
        break;
      }

      const chosen = policy.choose(
        { enabled, marking: this.statusSnapshot(), time: this.clock, step },
        () => this.random(),
      );
      const result = this.stepFire(chosen);
      if (result.ok) {
        report.fired.push(chosen);
        if (verbose) this.log(`[step ${step}] Fired ${chosen}.`);
      } else {
        report.rejections.push({
          step,
          transition: chosen,
          reason: result.reason,
          detail: result.detail,
        });
        if (verbose) {
          this.log(`[step ${step}] Failed attempt to fire ${chosen}: ${result.reason} (${result.detail})`);
        }
      }

      this.tick();
      report.steps = step + 1;
    }

    return report;
  }

  statusSnapshot(): Marking {
    const snapshot: Marking = {};
    for (const [name, place] of this.places) {
      snapshot[name] = place.count();
    }
    return snapshot;
  }

  formatStatus(): string {
    return formatStatus(`${this.name} status`, this.places.values());
  }

  printStatus(): void {
    this.log(this.formatStatus());
  }

  /**
   * Deep copy of places, transitions, stats and counters. The random source
   * and log sink are shared with this net, so a stateful `random` advances
   * for every copy that draws from it.
   */
  clone(): PetriNet {
    const copy = new PetriNet(this.options);
    for (const [name, place] of this.places) {
      copy.places.set(name, place.clone());
    }
    for (const [name, transition] of this.transitions) {
      copy.transitions.set(name, transition.clone());
    }
    for (const [stat, value] of this.counters) {
      copy.counters.set(stat, value);
    }
    copy.clock = this.clock;
    copy.batchCounter = this.batchCounter;
    return copy;
  }

  private log(line: string): void {
    (this.options.log ?? console.log)(line);
  }
}
