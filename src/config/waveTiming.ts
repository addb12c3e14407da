import type { LogLevel } from '../engine/logger';

const SECOND = 1000;
const MINUTE = 60 * SECOND;
const HOUR = 60 * MINUTE;
const DAY = 24 * HOUR;

/** Lead time before a hit during which the warming cue plays */
export const WARMING_DURATION_MS = 2.5 * MINUTE;
/** Second, shorter lead separating "about to be hit" from "warming" */
export const WARN_BEFORE_HIT_MS = 30 * SECOND;
/** Events closer than this are "near time" */
export const OBSERVE_DELAY_MS = 2 * HOUR;
/** Events starting within this window are "soon" */
export const SOON_DELAY_MS = 30 * DAY;

export const MAX_WAVE_SPEED = 20; // m/s, exclusive

/** Latitude band height for splitting the area at the wave front */
export const WAVE_BAND_HEIGHT_DEG = 0.05;
export const MAX_WAVE_BANDS = 200;

/** Hit-cache proximity, roughly one metre in degrees */
export const HIT_CACHE_EPSILON_DEG = 1e-5;

export const PROGRESSION_THRESHOLD = 0.1;
export const POSITION_RATIO_THRESHOLD = 0.01;
export const TIME_BEFORE_HIT_THRESHOLD_MS = SECOND;
export const CRITICAL_TIME_BEFORE_HIT_THRESHOLD_MS = 50;
export const CRITICAL_HIT_WINDOW_MS = 2 * SECOND;

export const SIMULATION_MIN_SPEED = 1;
export const SIMULATION_MAX_SPEED = 300;

export const LOG_BUFFER_SIZE = 1000;

const LOG_LEVEL_VALUES: LogLevel[] = ['debug', 'info', 'warn', 'error'];

export interface ProcessConfig {
  port: number;
  logLevel: LogLevel;
}

/** Read process settings from the environment */
export function readProcessConfig(env: NodeJS.ProcessEnv = process.env): ProcessConfig {
  const port = Number(env.PORT ?? 3001);
  const level = LOG_LEVEL_VALUES.find((l) => l === env.LOG_LEVEL);
  return {
    port: Number.isInteger(port) && port > 0 ? port : 3001,
    logLevel: level ?? 'info',
  };
}

export { SECOND, MINUTE, HOUR, DAY };
