import { MS_PER_HOUR } from '@taskfit/core';

/** Hours from an ISO timestamp to `end`, rounded to two decimals. */
export function hoursBetween(start: string, end: Date): number {
  const hours = (end.getTime() - new Date(start).getTime()) / MS_PER_HOUR;
  return Math.round(hours * 100) / 100;
}
