/**
 * Treadmill calorie model.
 *
 * A segment needs two of duration, speed and distance; the third follows
 * from distance = speed × (duration / 60). Calories use a MET value picked
 * from a speed table, nudged up by incline.
 */

export const KG_PER_LB = 0.453592;

/** Relative tolerance for a segment given all three of duration, speed and distance */
export const CONSISTENCY_TOLERANCE = 0.01;

/** [upper speed bound (mph, exclusive), MET] */
const MET_TABLE: ReadonlyArray<readonly [number, number]> = [
  [2.0, 2.0],
  [2.5, 2.5],
  [3.0, 3.0],
  [3.5, 3.5],
  [4.0, 4.3],
  [4.5, 5.0],
  [5.0, 6.0],
  [5.5, 8.3],
  [6.0, 9.0],
  [7.0, 9.8],
  [8.0, 10.5],
];
const MET_MAX = 11.5;

/** MET added per percent of incline */
const MET_PER_INCLINE_PERCENT = 0.1;

export type CalculatedField = "duration" | "speed" | "distance" | "none";

export interface SegmentMetrics {
  durationMinutes: number | null;
  speedMph: number | null;
  distanceMiles: number | null;
  calculatedField: CalculatedField;
  isConsistent: boolean;
}

export function deriveMissing(
  durationMinutes: number | null,
  speedMph: number | null,
  distanceMiles: number | null
): SegmentMetrics {
  if (durationMinutes !== null && speedMph !== null && distanceMiles !== null) {
    const expected = speedMph * (durationMinutes / 60);
    const error = Math.abs(expected - distanceMiles) / Math.max(distanceMiles, 0.001);
    return {
      durationMinutes,
      speedMph,
      distanceMiles,
      calculatedField: "none",
      isConsistent: error < CONSISTENCY_TOLERANCE,
    };
  }
  if (durationMinutes !== null && speedMph !== null) {
    return {
      durationMinutes,
      speedMph,
      distanceMiles: speedMph * (durationMinutes / 60),
      calculatedField: "distance",
      isConsistent: true,
    };
  }
  if (durationMinutes !== null && distanceMiles !== null) {
    return {
      durationMinutes,
      speedMph: durationMinutes > 0 ? distanceMiles / (durationMinutes / 60) : 0,
      distanceMiles,
      calculatedField: "speed",
      isConsistent: true,
    };
  }
  if (speedMph !== null && distanceMiles !== null) {
    return {
      durationMinutes: speedMph > 0 ? (distanceMiles / speedMph) * 60 : 0,
      speedMph,
      distanceMiles,
      calculatedField: "duration",
      isConsistent: true,
    };
  }
  return { durationMinutes, speedMph, distanceMiles, calculatedField: "none", isConsistent: true };
}

export function baseMet(speedMph: number): number {
  for (const [bound, met] of MET_TABLE) {
    if (speedMph < bound) return met;
  }
  return MET_MAX;
}

/** Calories burned, rounded to one decimal. Zero without a positive duration and speed. */
export function caloriesBurned(
  durationMinutes: number | null,
  speedMph: number | null,
  inclinePercent: number,
  weightLbs: number
): number {
  const duration = durationMinutes ?? 0;
  const speed = speedMph ?? 0;
  if (duration <= 0 || speed <= 0) return 0;

  const weightKg = weightLbs * KG_PER_LB;
  const met = baseMet(speed) + inclinePercent * MET_PER_INCLINE_PERCENT;
  const calories = met * weightKg * (duration / 60);
  return Math.round(calories * 10) / 10;
}
