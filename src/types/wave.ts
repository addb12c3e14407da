import type { Area } from './geo';

export type Direction = 'east' | 'west';

export type EventStatus = 'undefined' | 'next' | 'soon' | 'running' | 'done';

export type WaveKind = 'linear';

export interface WaveConfig {
  /** metres per second */
  speed: number;
  direction: Direction;
}

export interface WavePolygons {
  timestamp: number;       // epoch ms
  traversedArea: Area;
  remainingArea: Area;
}

export interface WaveObservation {
  progression: number;     // 0..100
  status: EventStatus;
}

export interface WaveNumbers {
  waveTimezone: string;
  waveSpeed: string;
  waveStartTime: string;
  waveEndTime: string;
  waveTotalTime: string;
  waveProgression: string;
}

export interface WaveEventConfig {
  id: string;
  /** IANA zone used for display, e.g. "Europe/Paris" */
  timeZone: string;
  /** ISO-8601 instant the event opens */
  startsAt: string;
  wave: WaveConfig;
  /** Fallback duration while the area is not loaded (ms) */
  approximateDurationMs: number;
  /** Gap between event start and wave start (ms) */
  startWarmingMs?: number;
}
