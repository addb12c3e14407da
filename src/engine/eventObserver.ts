import { createStore, type StoreApi } from 'zustand/vanilla';
import type { SimulationChangeSignal } from '../types/collaborators';
import type { Position } from '../types/geo';
import type { EventStatus, WaveNumbers, WaveObservation, WavePolygons } from '../types/wave';
import { currentPosition, subscribeToPosition, type PositionStore } from '../store/positionStore';
import { isCancellation, type Clock } from './clock';
import { logger, type ScopedLogger } from './logger';
import { getObservationInterval } from './observationInterval';
import { Signal, type Listener } from './signal';
import {
  validateTransition,
  validateUserState,
  type ValidationIssue,
  type ValidationIssueKind,
} from './stateMachine';
import {
  createProgressionThrottle,
  createRatioThrottle,
  createTimeBeforeHitThrottle,
  type Throttle,
} from './throttle';
import { UpdatePipeline, type UpdateSource } from './updatePipeline';
import { getAllNumbers } from './waveNumbers';
import type { WaveEvent } from './waveEvent';

export interface ObserverState {
  status: EventStatus;
  progression: number;
  isUserWarmingInProgress: boolean;
  isStartWarmingInProgress: boolean;
  userIsGoingToBeHit: boolean;
  userHasBeenHit: boolean;
  userPositionRatio: number | null;
  /** ms until the predicted hit, negative once passed */
  timeBeforeHit: number | null;
  predictedHitInstant: number | null;
  userIsInArea: boolean;
}

export const INITIAL_OBSERVER_STATE: ObserverState = {
  status: 'undefined',
  progression: 0,
  isUserWarmingInProgress: false,
  isStartWarmingInProgress: false,
  userIsGoingToBeHit: false,
  userHasBeenHit: false,
  userPositionRatio: null,
  timeBeforeHit: null,
  predictedHitInstant: null,
  userIsInArea: false,
};

export interface EventObserverDependencies {
  clock: Clock;
  positions: PositionStore;
  simulation?: SimulationChangeSignal;
}

interface UserComputation {
  hit: number | null;
  ratio: number | null;
  warmingStarted: boolean;
}

const CATEGORY = 'observer';

/**
 * Keeps a wave event's observable state current. One background task per
 * observer, started by the first listener registration (or `start()`), ticks
 * at an adaptive interval and merges position and simulation changes into
 * the same serial update stream.
 */
export class EventObserver {
  readonly state: StoreApi<ObserverState> = createStore<ObserverState>(() => ({ ...INITIAL_OBSERVER_STATE }));

  private readonly statusChanged = new Signal<EventStatus>('status-changed');
  private readonly progressionChanged = new Signal<number>('progression-changed');
  private readonly warmingEnded = new Signal<void>('warming-ended', 'replay');
  private readonly aboutToBeHit = new Signal<void>('about-to-be-hit', 'replay');
  private readonly hasBeenHit = new Signal<void>('has-been-hit', 'replay');

  private readonly progressionGate: Throttle = createProgressionThrottle();
  private readonly ratioGate: Throttle = createRatioThrottle();
  private readonly timeBeforeHitGate: Throttle = createTimeBeforeHitThrottle();

  private task: Promise<void> | null = null;
  private controller: AbortController | null = null;
  private pipeline: UpdatePipeline | null = null;
  private unsubscribers: Array<() => void> = [];

  private readonly log: ScopedLogger;
  private lastObservation: WaveObservation | null = null;
  private reportedIssues = new Set<ValidationIssueKind>();
  private nextInterval = Infinity;

  constructor(
    readonly event: WaveEvent,
    private readonly deps: EventObserverDependencies,
  ) {
    this.log = logger.scoped(CATEGORY, { eventId: event.id });
  }

  get isObserving(): boolean {
    return this.task !== null;
  }

  /** Subscribe to one field of the observable state */
  observe<K extends keyof ObserverState>(key: K, listener: (value: ObserverState[K]) => void): () => void {
    return this.state.subscribe((next, prev) => {
      if (next[key] !== prev[key]) listener(next[key]);
    });
  }

  start(): this {
    if (this.task) return this;

    const controller = new AbortController();
    const pipeline = new UpdatePipeline((sources) => this.evaluate(sources, controller.signal), CATEGORY);
    this.controller = controller;
    this.pipeline = pipeline;

    this.unsubscribers.push(subscribeToPosition(this.deps.positions, () => void pipeline.push('position')));
    if (this.deps.simulation) {
      this.unsubscribers.push(this.deps.simulation.subscribe(() => void pipeline.push('simulation')));
    }

    this.log.info('Starting observation');
    this.task = this.run(pipeline, controller);
    return this;
  }

  /** Cancel the task and wait until nothing else can be applied */
  async stop(): Promise<void> {
    const task = this.task;
    if (!task) return;

    this.controller?.abort();
    this.unsubscribeAll();

    await task;
    await this.pipeline?.idle();

    this.task = null;
    this.controller = null;
    this.pipeline = null;
    this.log.info('Stopped observation');
  }

  addOnStatusChangedListener(listener: Listener<EventStatus>): this {
    this.statusChanged.subscribe(listener);
    return this.start();
  }

  addOnProgressionChangedListener(listener: Listener<number>): this {
    this.progressionChanged.subscribe(listener);
    return this.start();
  }

  addOnWarmingEndedListener(listener: () => void): this {
    this.warmingEnded.subscribe(listener);
    return this.start();
  }

  addOnUserIsGoingToBeHitListener(listener: () => void): this {
    this.aboutToBeHit.subscribe(listener);
    return this.start();
  }

  addOnUserHasBeenHitListener(listener: () => void): this {
    this.hasBeenHit.subscribe(listener);
    return this.start();
  }

  getWavePolygons(): Promise<WavePolygons | null> {
    return this.event.wave.getWavePolygons();
  }

  getAllNumbers(): Promise<WaveNumbers> {
    return getAllNumbers(this.event);
  }

  hasUserBeenHitInCurrentPosition(): Promise<boolean> {
    return this.event.wave.hasUserBeenHitInCurrentPosition();
  }

  /** Cross-field anomalies in the current state */
  validateStateConsistency(): ValidationIssue[] {
    const state = this.state.getState();
    return [
      ...validateTransition(null, { status: state.status, progression: state.progression }),
      ...validateUserState(state),
    ];
  }

  private async run(pipeline: UpdatePipeline, controller: AbortController): Promise<void> {
    const { signal } = controller;
    let completed = false;
    try {
      while (!signal.aborted) {
        await pipeline.push('tick');
        if (signal.aborted) break;

        if (this.lastObservation?.status === 'done') {
          this.log.info('Event is done, ending observation loop');
          completed = true;
          break;
        }
        if (!Number.isFinite(this.nextInterval)) {
          this.log.info('No further ticks needed');
          completed = true;
          break;
        }
        await this.deps.clock.delay(this.nextInterval, signal);
      }
    } catch (err) {
      if (isCancellation(err)) {
        this.log.debug('Observation loop cancelled');
        return;
      }
      this.log.error('Observation loop failed', err);
    }
    if (signal.aborted) return;

    // Ended on its own: release triggers and let pending updates settle
    this.unsubscribeAll();
    await pipeline.idle();
    if (signal.aborted) return;
    if (completed) this.publishDone();
    if (this.controller === controller) {
      this.task = null;
      this.controller = null;
      this.pipeline = null;
    }
  }

  private unsubscribeAll() {
    for (const unsubscribe of this.unsubscribers) unsubscribe();
    this.unsubscribers = [];
  }

  /** Final observation once the loop has ended */
  private publishDone() {
    const previous = this.state.getState();
    const final: WaveObservation = { status: 'done', progression: 100 };
    this.lastObservation = final;
    this.apply(previous, { ...previous, ...final });
  }

  /** One combined update: area detection and every derived value, computed once */
  private async evaluate(sources: ReadonlySet<UpdateSource>, signal: AbortSignal): Promise<void> {
    const { event } = this;
    const previous = this.state.getState();
    this.log.debug('Evaluating', [...sources]);

    let status = previous.status;
    try {
      status = await event.getStatus();
    } catch (err) {
      this.log.error('Error getting status', err);
    }

    let progression = previous.progression;
    try {
      progression = await event.wave.getProgression();
    } catch (err) {
      this.log.error('Error getting progression', err);
    }

    const position = currentPosition(this.deps.positions);
    const userIsInArea = await this.detectArea(position, previous.userIsInArea);
    const user = await this.computeUser(position, previous);

    const now = this.deps.clock.now();
    const timeBeforeHit = user.hit === null ? null : user.hit - now;
    const userHasBeenHit = user.hit !== null && user.hit <= now;
    const userIsGoingToBeHit =
      userIsInArea &&
      timeBeforeHit !== null &&
      timeBeforeHit > 0 &&
      timeBeforeHit <= event.warming.getWarnBeforeHitDuration() &&
      !userHasBeenHit;
    const isUserWarmingInProgress = user.warmingStarted && !userIsGoingToBeHit && !userHasBeenHit;

    this.nextInterval = getObservationInterval({
      timeBeforeEventStart: event.getStartDateTime() - now,
      timeBeforeHit,
      isRunning: status === 'running',
    });

    const observation = { status, progression };
    this.report(validateTransition(this.lastObservation, observation));
    this.lastObservation = observation;

    if (signal.aborted) return;

    this.apply(previous, {
      status,
      progression,
      isUserWarmingInProgress,
      isStartWarmingInProgress: event.isStartWarmingInProgress(),
      userIsGoingToBeHit,
      userHasBeenHit,
      userPositionRatio: user.ratio,
      timeBeforeHit,
      predictedHitInstant: user.hit,
      userIsInArea,
    });
  }

  private async detectArea(position: Position | null, previous: boolean): Promise<boolean> {
    if (!position) return false;
    // Keep the last answer until polygons arrive
    if (!this.event.area.isLoaded()) return previous;
    try {
      return await this.event.area.isPositionWithin(position);
    } catch (err) {
      this.log.error('Area detection failed', err);
      return false;
    }
  }

  private async computeUser(position: Position | null, previous: ObserverState): Promise<UserComputation> {
    const { wave, warming } = this.event;
    try {
      return {
        hit: await wave.userHitDateTime(position),
        ratio: await wave.userPositionToWaveRatio(position),
        warmingStarted: await warming.isUserWarmingStarted(position),
      };
    } catch (err) {
      this.log.error('Error computing user hit', err);
      return {
        hit: previous.predictedHitInstant,
        ratio: previous.userPositionRatio,
        warmingStarted: previous.isUserWarmingInProgress,
      };
    }
  }

  /** Log issues not already reported on the previous tick */
  private report(issues: ValidationIssue[]) {
    const kinds = new Set(issues.map((i) => i.kind));
    for (const issue of issues) {
      if (!this.reportedIssues.has(issue.kind)) {
        this.log.warn(issue.message, { kind: issue.kind });
      }
    }
    this.reportedIssues = kinds;
  }

  private apply(previous: ObserverState, next: ObserverState) {
    const patch: Partial<ObserverState> = {};

    if (next.status !== previous.status) patch.status = next.status;

    const progressionTerminal = next.progression === 0 || next.progression === 100;
    if (this.progressionGate.accept(next.progression, progressionTerminal) && next.progression !== previous.progression) {
      patch.progression = next.progression;
    }

    const ratio = this.gateNullable(this.ratioGate, next.userPositionRatio, previous.userPositionRatio, (r) => r === 0 || r === 1);
    if (ratio !== undefined) patch.userPositionRatio = ratio;

    const tbh = this.gateNullable(this.timeBeforeHitGate, next.timeBeforeHit, previous.timeBeforeHit, () => false);
    if (tbh !== undefined) patch.timeBeforeHit = tbh;

    if (next.predictedHitInstant !== previous.predictedHitInstant) patch.predictedHitInstant = next.predictedHitInstant;
    if (next.userIsInArea !== previous.userIsInArea) patch.userIsInArea = next.userIsInArea;
    if (next.isStartWarmingInProgress !== previous.isStartWarmingInProgress) {
      patch.isStartWarmingInProgress = next.isStartWarmingInProgress;
    }
    if (next.isUserWarmingInProgress !== previous.isUserWarmingInProgress) {
      patch.isUserWarmingInProgress = next.isUserWarmingInProgress;
    }
    if (next.userIsGoingToBeHit !== previous.userIsGoingToBeHit) patch.userIsGoingToBeHit = next.userIsGoingToBeHit;
    if (next.userHasBeenHit !== previous.userHasBeenHit) patch.userHasBeenHit = next.userHasBeenHit;

    if (Object.keys(patch).length > 0) this.state.setState(patch);

    if (patch.status !== undefined) this.statusChanged.emit(patch.status);
    if (patch.progression !== undefined) this.progressionChanged.emit(patch.progression);
    if (previous.isUserWarmingInProgress && !next.isUserWarmingInProgress) this.warmingEnded.emit();
    if (!previous.userIsGoingToBeHit && next.userIsGoingToBeHit) this.aboutToBeHit.emit();
    if (!previous.userHasBeenHit && next.userHasBeenHit) this.hasBeenHit.emit();
  }

  /**
   * Throttled update for a value that may be unknown. Returns the value to
   * publish, or undefined to leave the current one.
   */
  private gateNullable(
    gate: Throttle,
    next: number | null,
    previous: number | null,
    isTerminal: (value: number) => boolean,
  ): number | null | undefined {
    if (next === null) {
      gate.reset();
      return previous === null ? undefined : null;
    }
    if (previous === null) gate.reset();
    if (!gate.accept(next, isTerminal(next)) || next === previous) return undefined;
    return next;
  }
}
