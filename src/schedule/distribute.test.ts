import { describe, expect, it } from 'vitest';
import type { WindowConfig } from '../config';
import { campaignStart, planSlots, slotsForDay } from './distribute';

const WINDOW: WindowConfig = { startHour: 8, endHour: 23, minIntervalMinutes: 30 };

// 14 and 15 July 2026, local time
const at = (day: number, hour: number, minute = 0) => new Date(2026, 6, 14 + day, hour, minute).getTime();

describe('campaignStart', () => {
  it('keeps one interval of distance inside the window, on a five-minute mark', () => {
    expect(campaignStart(at(0, 9), WINDOW)).toBe(at(0, 9, 30));
    expect(campaignStart(at(0, 9, 7), WINDOW)).toBe(at(0, 9, 35));
  });

  it('stays after the start instant with intervals under five minutes', () => {
    const tight: WindowConfig = { startHour: 8, endHour: 23, minIntervalMinutes: 1 };
    expect(campaignStart(at(0, 9), tight)).toBe(at(0, 9, 5));
    expect(campaignStart(at(0, 9, 2), tight)).toBe(at(0, 9, 5));
    expect(campaignStart(at(0, 9, 3), tight)).toBe(at(0, 9, 5));
    const now = at(0, 9);
    expect(planSlots(1, 1, campaignStart(now, tight), now, tight)).toEqual([
      { day: 0, slots: [at(0, 9, 5)], deferred: false },
    ]);
  });

  it('snaps to the window start before it opens', () => {
    expect(campaignStart(at(0, 6, 45), WINDOW)).toBe(at(0, 8));
  });

  it('moves to the next morning once the window has closed', () => {
    expect(campaignStart(at(0, 23, 30), WINDOW)).toBe(at(1, 8));
  });

  it('never starts in the past', () => {
    expect(campaignStart(at(0, 9), WINDOW, at(-1, 10))).toBe(at(0, 9, 30));
    expect(campaignStart(at(0, 9), WINDOW, at(1, 10))).toBe(at(1, 10, 30));
  });
});

describe('slotsForDay', () => {
  it('spreads slots evenly to the end of the window', () => {
    expect(slotsForDay(at(0, 9, 30), 3, WINDOW)).toEqual([at(0, 9, 30), at(0, 14), at(0, 18, 30)]);
  });

  it('returns null when the slots cannot keep the minimum interval', () => {
    expect(slotsForDay(at(0, 22, 30), 2, WINDOW)).toBeNull();
    expect(slotsForDay(at(0, 22, 30), 1, WINDOW)).toEqual([at(0, 22, 30)]);
  });
});

describe('planSlots', () => {
  it('fills days at the requested pace', () => {
    const now = at(0, 9);
    const plans = planSlots(7, 3, campaignStart(now, WINDOW), now, WINDOW);
    expect(plans).toEqual([
      { day: 0, slots: [at(0, 9, 30), at(0, 14), at(0, 18, 30)], deferred: false },
      { day: 1, slots: [at(1, 8), at(1, 13), at(1, 18)], deferred: false },
      { day: 2, slots: [at(2, 8)], deferred: false },
    ]);
  });

  it('defers a bucket that does not fit and shifts later ones', () => {
    const now = at(0, 22);
    const plans = planSlots(4, 3, campaignStart(now, WINDOW), now, WINDOW);
    expect(plans).toEqual([
      { day: 1, slots: [at(1, 8), at(1, 13), at(1, 18)], deferred: true },
      { day: 2, slots: [at(2, 8)], deferred: false },
    ]);
  });

  it('carries posts whose slots already passed into the next day', () => {
    const plans = planSlots(3, 3, at(0, 8), at(0, 12), WINDOW);
    expect(plans).toEqual([
      { day: 0, slots: [at(0, 13), at(0, 18)], deferred: false },
      { day: 1, slots: [at(1, 8)], deferred: false },
    ]);
  });

  it('gives up when the window cannot hold a day at all', () => {
    const narrow: WindowConfig = { startHour: 8, endHour: 9, minIntervalMinutes: 30 };
    expect(planSlots(3, 3, at(0, 8), at(0, 7), narrow)).toEqual([]);
  });
});
