import { SIMULATION_MAX_SPEED, SIMULATION_MIN_SPEED } from '../config/waveTiming';
import type { Position } from '../types/geo';
import type { PositionStore } from '../store/positionStore';
import { systemClock, type Clock } from './clock';
import { logger } from './logger';
import { Signal } from './signal';
import type { WaveEvent } from './waveEvent';
import type { RandomSource } from '../utils/random';

interface Checkpoint {
  realTime: number;
  simulatedTime: number;
}

function validateSpeed(speed: number): number {
  if (!Number.isInteger(speed) || speed < SIMULATION_MIN_SPEED || speed > SIMULATION_MAX_SPEED) {
    throw new Error(
      `Invalid speed: ${speed}. Must be between ${SIMULATION_MIN_SPEED} and ${SIMULATION_MAX_SPEED}.`,
    );
  }
  return speed;
}

/**
 * Accelerated clock starting at a chosen instant. Time is tracked from the
 * last checkpoint so speed changes and pauses never make it jump.
 */
export class WaveSimulation implements Clock {
  private speedFactor: number;
  private resumeSpeed: number;
  private checkpoint: Checkpoint;

  constructor(
    private readonly startDateTime: number,
    private readonly userPosition: Position,
    initialSpeed = 1,
    private readonly realClock: Clock = systemClock,
  ) {
    this.speedFactor = validateSpeed(initialSpeed);
    this.resumeSpeed = this.speedFactor;
    this.checkpoint = { realTime: realClock.now(), simulatedTime: startDateTime };
  }

  get speed(): number {
    return this.speedFactor;
  }

  get paused(): boolean {
    return this.speedFactor === 0;
  }

  getUserPosition(): Position {
    return this.userPosition;
  }

  now(): number {
    const elapsedReal = this.realClock.now() - this.checkpoint.realTime;
    return this.checkpoint.simulatedTime + elapsedReal * this.speedFactor;
  }

  /** Simulated delay: waits `ms / speed` of real time (the full `ms` while paused) */
  delay(ms: number, signal?: AbortSignal): Promise<void> {
    const factor = this.speedFactor > 0 ? this.speedFactor : 1;
    return this.realClock.delay(ms / factor, signal);
  }

  setSpeed(speed: number): number {
    const next = validateSpeed(speed);
    this.checkpoint = { realTime: this.realClock.now(), simulatedTime: this.now() };
    this.speedFactor = next;
    this.resumeSpeed = next;
    return next;
  }

  pause() {
    this.checkpoint = { realTime: this.realClock.now(), simulatedTime: this.now() };
    this.speedFactor = 0;
  }

  resume(speed = this.resumeSpeed) {
    const next = validateSpeed(speed);
    this.checkpoint = { realTime: this.realClock.now(), simulatedTime: this.now() };
    this.speedFactor = next;
    this.resumeSpeed = next;
  }

  reset() {
    this.checkpoint = { realTime: this.realClock.now(), simulatedTime: this.startDateTime };
  }
}

/**
 * Clock that delegates to the active simulation, or to the real clock when
 * none is set. Also the change signal observers listen to.
 */
export class SimulationControl implements Clock {
  private simulation: WaveSimulation | null = null;
  private readonly changed = new Signal<WaveSimulation | null>('simulation-changed');

  constructor(
    private readonly positions: PositionStore,
    private readonly base: Clock = systemClock,
  ) {}

  get active(): WaveSimulation | null {
    return this.simulation;
  }

  now(): number {
    return this.simulation ? this.simulation.now() : this.base.now();
  }

  delay(ms: number, signal?: AbortSignal): Promise<void> {
    return this.simulation ? this.simulation.delay(ms, signal) : this.base.delay(ms, signal);
  }

  setSimulation(simulation: WaveSimulation) {
    this.simulation = simulation;
    this.positions.getState().setSimulatedPosition(simulation.getUserPosition());
    logger.info('simulation', 'Simulation enabled', {
      start: new Date(this.simulation.now()).toISOString(),
      speed: simulation.speed,
    });
    this.changed.emit(simulation);
  }

  disableSimulation() {
    if (!this.simulation) return;
    this.simulation = null;
    this.positions.getState().setSimulatedPosition(null);
    logger.info('simulation', 'Simulation disabled');
    this.changed.emit(null);
  }

  setSpeed(speed: number) {
    if (!this.simulation) throw new Error('No simulation active');
    this.simulation.setSpeed(speed);
    this.changed.emit(this.simulation);
  }

  pause() {
    if (!this.simulation) return;
    this.simulation.pause();
    this.changed.emit(this.simulation);
  }

  resume(speed?: number) {
    if (!this.simulation) return;
    this.simulation.resume(speed);
    this.changed.emit(this.simulation);
  }

  subscribe(listener: () => void): () => void {
    return this.changed.subscribe(() => listener());
  }
}

export interface EventSimulationOptions {
  speed?: number;
  /** Simulated start relative to the event start (ms) */
  offsetMs?: number;
  random?: RandomSource;
}

/** Simulation starting near an event, with the user placed at a random point of its area */
export async function createEventSimulation(
  event: WaveEvent,
  options: EventSimulationOptions = {},
  realClock: Clock = systemClock,
): Promise<WaveSimulation> {
  const position = await event.area.generateRandomPositionInArea(options.random);
  if (!position) throw new Error(`Cannot place a simulated user in event ${event.id}`);
  return new WaveSimulation(
    event.getStartDateTime() + (options.offsetMs ?? 0),
    position,
    options.speed ?? 1,
    realClock,
  );
}
