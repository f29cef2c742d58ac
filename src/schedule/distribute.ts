import type { WindowConfig } from '../config';
import { MINUTE_MS, atHour, floorToMinutes, hourOf } from '../utils/time';

export interface DayPlan {
  day: number; // offset from the campaign start day
  slots: number[]; // epoch ms, ascending
  deferred: boolean; // bucket did not fit the day it was aimed at
}

/**
 * Where a campaign starts: never in the past, and inside the posting window.
 * Inside the window the first slot keeps one minimum interval of distance from
 * the start instant, rounded down to a five-minute mark that is still after it.
 */
export function campaignStart(now: number, window: WindowConfig, requested?: number): number {
  const start = requested === undefined || requested < now ? now : requested;
  const hour = hourOf(start);
  if (hour < window.startHour) return atHour(start, window.startHour);
  if (hour >= window.endHour) return atHour(start, window.startHour, 1);
  const floored = floorToMinutes(start + window.minIntervalMinutes * MINUTE_MS, 5);
  // intervals under five minutes can floor back to the start itself
  return floored > start ? floored : floored + 5 * MINUTE_MS;
}

/**
 * Spreads `count` slots evenly from `from` to the end of that day's window.
 * Returns null when they cannot be kept `minIntervalMinutes` apart.
 */
export function slotsForDay(from: number, count: number, window: WindowConfig): number[] | null {
  const end = atHour(from, window.endHour);
  const windowMinutes = Math.floor((end - from) / MINUTE_MS);
  if (count < 1 || windowMinutes < count * window.minIntervalMinutes) return null;

  const interval = Math.floor(windowMinutes / count);
  const slots: number[] = [];
  for (let i = 0; i < count; i++) slots.push(from + i * interval * MINUTE_MS);
  return slots;
}

/**
 * Plans the slots for `total` posts at `perDay` per day. A bucket that does not
 * fit what is left of its day moves whole to the next day's full window, and
 * every later bucket moves with it. Slots that are already in the past at
 * `now` are dropped; their posts are carried over into the next day's bucket.
 */
export function planSlots(
  total: number,
  perDay: number,
  start: number,
  now: number,
  window: WindowConfig,
): DayPlan[] {
  const plans: DayPlan[] = [];
  let remaining = total;
  let day = 0;
  let cursor = start;
  // bounded: every day after the first gets a full window, so it always places slots
  const maxDays = total + 2;

  while (remaining > 0 && day < maxDays) {
    const size = Math.min(perDay, remaining);
    let slots = slotsForDay(cursor, size, window);
    let deferred = false;
    if (!slots) {
      deferred = true;
      day += 1;
      cursor = atHour(start, window.startHour, day);
      slots = slotsForDay(cursor, size, window);
    }
    if (!slots) break; // window narrower than perDay * minInterval

    const future = slots.filter((s) => s > now);
    plans.push({ day, slots: future, deferred });
    remaining -= future.length;
    day += 1;
    cursor = atHour(start, window.startHour, day);
  }

  return plans;
}
