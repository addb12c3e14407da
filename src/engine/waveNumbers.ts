import type { WaveNumbers } from '../types/wave';
import { logger } from './logger';
import type { WaveEvent } from './waveEvent';

const ERROR_PLACEHOLDER = 'error';

/** "UTC", "UTC+2", "UTC-5", "UTC+5:30" for the zone at the given instant */
export function formatUtcOffset(timeZone: string, instant: number): string {
  const parts = new Intl.DateTimeFormat('en-US', { timeZone, timeZoneName: 'shortOffset' }).formatToParts(instant);
  const name = parts.find((p) => p.type === 'timeZoneName')?.value ?? 'GMT';
  return name.replace('GMT', 'UTC');
}

/** 24-hour "HH:mm" in the given zone */
export function formatClockTime(instant: number, timeZone: string): string {
  const parts = new Intl.DateTimeFormat('en-GB', {
    timeZone,
    hour: '2-digit',
    minute: '2-digit',
    hourCycle: 'h23',
  }).formatToParts(instant);
  const hour = parts.find((p) => p.type === 'hour')?.value ?? '0';
  const minute = parts.find((p) => p.type === 'minute')?.value ?? '0';
  return `${hour.padStart(2, '0')}:${minute.padStart(2, '0')}`;
}

/** Whole minutes, e.g. "186 min" */
export function formatTotalMinutes(durationMs: number): string {
  return `${Math.round(durationMs / 60_000)} min`;
}

async function field(name: string, compute: () => string | Promise<string>): Promise<string> {
  try {
    return await compute();
  } catch (err) {
    logger.warn('numbers', `Could not compute ${name}`, err);
    return ERROR_PLACEHOLDER;
  }
}

/** Display strings for an event; a failing field reads "error" */
export async function getAllNumbers(event: WaveEvent): Promise<WaveNumbers> {
  const { timeZone } = event;
  return {
    waveTimezone: await field('timezone', () => formatUtcOffset(timeZone, event.getStartDateTime())),
    waveSpeed: await field('speed', () => `${event.wave.speed} m/s`),
    waveStartTime: await field('start time', () => formatClockTime(event.getWaveStartDateTime(), timeZone)),
    waveEndTime: await field('end time', async () => formatClockTime(await event.getEndDateTime(), timeZone)),
    waveTotalTime: await field('total time', async () => formatTotalMinutes(await event.wave.getWaveDuration())),
    waveProgression: await field('progression', async () => `${(await event.wave.getProgression()).toFixed(1)}%`),
  };
}
