import type { DB } from "../db.js";
import { NotFoundError, ValidationError } from "../errors.js";
import { caloriesBurned, deriveMissing, type CalculatedField } from "../engine/exercise.js";
import {
  bodyWeightInputSchema,
  exerciseInputSchema,
  parseInput,
  segmentInputSchema,
  segmentUpdateSchema,
  type ExerciseInput,
  type ExerciseType,
  type SegmentInput,
  type SegmentUpdate,
} from "./schemas.js";
import { getOrCreateDay, requireDay, updateDayCaloriesBurned, withTransaction, type Day } from "./store.js";

export interface Exercise {
  id: number;
  dayId: number;
  exerciseType: ExerciseType;
  notes: string | null;
  durationMinutes: number;
  distanceMiles: number;
  caloriesBurned: number;
  createdAt: string;
}

export interface ExerciseSegment {
  id: number;
  exerciseId: number;
  segmentOrder: number;
  durationMinutes: number | null;
  speedMph: number | null;
  distanceMiles: number | null;
  inclinePercent: number;
  avgHeartRate: number | null;
  calculatedField: CalculatedField;
  isConsistent: boolean;
  caloriesBurned: number;
  weightUsedLbs: number;
  notes: string | null;
}

export interface BodyWeight {
  id: number;
  recordedOn: string;
  weightLbs: number;
}

type ExerciseRow = {
  id: number;
  day_id: number;
  exercise_type: ExerciseType;
  notes: string | null;
  cached_duration_minutes: number;
  cached_distance_miles: number;
  cached_calories_burned: number;
  created_at: string;
};

type SegmentRow = {
  id: number;
  exercise_id: number;
  segment_order: number;
  duration_minutes: number | null;
  speed_mph: number | null;
  distance_miles: number | null;
  incline_percent: number;
  avg_heart_rate: number | null;
  calculated_field: CalculatedField;
  is_consistent: number;
  calories_burned: number;
  weight_used_lbs: number;
  notes: string | null;
};

function rowToExercise(row: ExerciseRow): Exercise {
  return {
    id: row.id,
    dayId: row.day_id,
    exerciseType: row.exercise_type,
    notes: row.notes,
    durationMinutes: row.cached_duration_minutes,
    distanceMiles: row.cached_distance_miles,
    caloriesBurned: row.cached_calories_burned,
    createdAt: row.created_at,
  };
}

function rowToSegment(row: SegmentRow): ExerciseSegment {
  return {
    id: row.id,
    exerciseId: row.exercise_id,
    segmentOrder: row.segment_order,
    durationMinutes: row.duration_minutes,
    speedMph: row.speed_mph,
    distanceMiles: row.distance_miles,
    inclinePercent: row.incline_percent,
    avgHeartRate: row.avg_heart_rate,
    calculatedField: row.calculated_field,
    isConsistent: row.is_consistent === 1,
    caloriesBurned: row.calories_burned,
    weightUsedLbs: row.weight_used_lbs,
    notes: row.notes,
  };
}

const round1 = (n: number): number => Math.round(n * 10) / 10;
const round2 = (n: number): number => Math.round(n * 100) / 100;

function requireExercise(db: DB, id: number): Exercise {
  const row = db.prepare<[number], ExerciseRow>("SELECT * FROM exercises WHERE id = ?").get(id);
  if (!row) throw new NotFoundError("Exercise", id);
  return rowToExercise(row);
}

function requireSegment(db: DB, id: number): ExerciseSegment {
  const row = db.prepare<[number], SegmentRow>("SELECT * FROM exercise_segments WHERE id = ?").get(id);
  if (!row) throw new NotFoundError("Exercise segment", id);
  return rowToSegment(row);
}

export function listSegments(db: DB, exerciseId: number): ExerciseSegment[] {
  return db
    .prepare<[number], SegmentRow>("SELECT * FROM exercise_segments WHERE exercise_id = ? ORDER BY segment_order, id")
    .all(exerciseId)
    .map(rowToSegment);
}

export function listExercisesForDay(db: DB, dayId: number): Exercise[] {
  return db
    .prepare<[number], ExerciseRow>("SELECT * FROM exercises WHERE day_id = ? ORDER BY id")
    .all(dayId)
    .map(rowToExercise);
}

// ---- Aggregates ----

/** Re-sums a day's calories burned from its exercises. */
export function recalculateDayCaloriesBurned(db: DB, dayId: number): number {
  const row = db
    .prepare<[number], { total: number }>(
      "SELECT COALESCE(SUM(cached_calories_burned), 0) AS total FROM exercises WHERE day_id = ?"
    )
    .get(dayId);
  const total = round1(row?.total ?? 0);
  updateDayCaloriesBurned(db, dayId, total);
  return total;
}

function recalculateExercise(db: DB, exerciseId: number): Exercise {
  const segments = listSegments(db, exerciseId);
  let duration = 0;
  let distance = 0;
  let calories = 0;
  for (const s of segments) {
    duration += s.durationMinutes ?? 0;
    distance += s.distanceMiles ?? 0;
    calories += s.caloriesBurned;
  }

  db.prepare<[number, number, number, number]>(
    `UPDATE exercises SET cached_duration_minutes = ?, cached_distance_miles = ?, cached_calories_burned = ?,
       updated_at = datetime('now') WHERE id = ?`
  ).run(round2(duration), round2(distance), round1(calories), exerciseId);

  const exercise = requireExercise(db, exerciseId);
  recalculateDayCaloriesBurned(db, exercise.dayId);
  return exercise;
}

// ---- Body weight ----

export function recordBodyWeight(db: DB, input: { weightLbs: number; date: string }): BodyWeight {
  const data = parseInput(bodyWeightInputSchema, input);
  const info = db
    .prepare<[string, number]>("INSERT INTO body_weights (recorded_on, weight_lbs) VALUES (?, ?)")
    .run(data.date, data.weightLbs);
  return { id: Number(info.lastInsertRowid), recordedOn: data.date, weightLbs: data.weightLbs };
}

export function listBodyWeights(db: DB, limit = 30): BodyWeight[] {
  return db
    .prepare<[number], { id: number; recorded_on: string; weight_lbs: number }>(
      "SELECT id, recorded_on, weight_lbs FROM body_weights ORDER BY recorded_on DESC, id DESC LIMIT ?"
    )
    .all(limit)
    .map((r) => ({ id: r.id, recordedOn: r.recorded_on, weightLbs: r.weight_lbs }));
}

/** Most recent reading on or before `date`. */
export function latestBodyWeight(db: DB, date: string): number | null {
  const row = db
    .prepare<[string], { weight_lbs: number }>(
      "SELECT weight_lbs FROM body_weights WHERE recorded_on <= ? ORDER BY recorded_on DESC, id DESC LIMIT 1"
    )
    .get(date);
  return row?.weight_lbs ?? null;
}

// ---- Exercises ----

export interface ExerciseDetail {
  exercise: Exercise;
  date: string;
  segments: ExerciseSegment[];
}

export function addExercise(db: DB, input: ExerciseInput): ExerciseDetail {
  const data = parseInput(exerciseInputSchema, input);
  return withTransaction(db, () => {
    const { day } = getOrCreateDay(db, data.date);
    const info = db
      .prepare<[number, string, string | null]>("INSERT INTO exercises (day_id, exercise_type, notes) VALUES (?, ?, ?)")
      .run(day.id, data.exerciseType, data.notes ?? null);
    return getExerciseDetail(db, Number(info.lastInsertRowid));
  });
}

export function getExerciseDetail(db: DB, id: number): ExerciseDetail {
  const exercise = requireExercise(db, id);
  return { exercise, date: requireDay(db, exercise.dayId).date, segments: listSegments(db, id) };
}

export function listExercises(db: DB, options: { from?: string; to?: string; limit?: number } = {}): ExerciseDetail[] {
  const where: string[] = [];
  const params: Array<string | number> = [];
  if (options.from) {
    where.push("d.date >= ?");
    params.push(options.from);
  }
  if (options.to) {
    where.push("d.date <= ?");
    params.push(options.to);
  }
  const whereSql = where.length > 0 ? `WHERE ${where.join(" AND ")}` : "";
  return db
    .prepare<Array<string | number>, { id: number }>(
      `SELECT e.id FROM exercises e JOIN days d ON d.id = e.day_id ${whereSql} ORDER BY d.date DESC, e.id DESC LIMIT ?`
    )
    .all(...params, options.limit ?? 30)
    .map((r) => getExerciseDetail(db, r.id));
}

export function deleteExercise(db: DB, id: number): { deleted: Exercise; day: Day } {
  return withTransaction(db, () => {
    const existing = requireExercise(db, id);
    db.prepare<[number]>("DELETE FROM exercises WHERE id = ?").run(id);
    recalculateDayCaloriesBurned(db, existing.dayId);
    return { deleted: existing, day: requireDay(db, existing.dayId) };
  });
}

// ---- Segments ----

export interface SegmentChange {
  segment: ExerciseSegment;
  exercise: Exercise;
}

interface SegmentValues {
  durationMinutes: number | null;
  speedMph: number | null;
  distanceMiles: number | null;
  inclinePercent: number;
}

function measureSegment(db: DB, exercise: Exercise, values: SegmentValues, defaultWeightLbs: number) {
  const given = [values.durationMinutes, values.speedMph, values.distanceMiles].filter((v) => v !== null).length;
  if (given < 2) {
    throw new ValidationError("A segment needs at least two of duration, speed and distance");
  }
  const metrics = deriveMissing(values.durationMinutes, values.speedMph, values.distanceMiles);
  const date = requireDay(db, exercise.dayId).date;
  const weightLbs = latestBodyWeight(db, date) ?? defaultWeightLbs;
  return {
    ...metrics,
    weightLbs,
    calories: caloriesBurned(metrics.durationMinutes, metrics.speedMph, values.inclinePercent, weightLbs),
  };
}

/**
 * Adds a treadmill segment. The missing one of duration/speed/distance is
 * derived, calories use the latest body weight on or before the exercise
 * date, and exercise and day totals are refreshed.
 */
export function addSegment(
  db: DB,
  exerciseId: number,
  input: SegmentInput,
  defaultWeightLbs: number
): SegmentChange {
  const data = parseInput(segmentInputSchema, input);

  return withTransaction(db, () => {
    const exercise = requireExercise(db, exerciseId);
    const m = measureSegment(
      db,
      exercise,
      {
        durationMinutes: data.durationMinutes ?? null,
        speedMph: data.speedMph ?? null,
        distanceMiles: data.distanceMiles ?? null,
        inclinePercent: data.inclinePercent,
      },
      defaultWeightLbs
    );

    const order = db
      .prepare<[number], { n: number }>(
        "SELECT COALESCE(MAX(segment_order), 0) + 1 AS n FROM exercise_segments WHERE exercise_id = ?"
      )
      .get(exerciseId);

    const info = db
      .prepare(
        `INSERT INTO exercise_segments (exercise_id, segment_order, duration_minutes, speed_mph, distance_miles,
           incline_percent, avg_heart_rate, calculated_field, is_consistent, calories_burned, weight_used_lbs, notes)
         VALUES (@exerciseId, @order, @duration, @speed, @distance, @incline, @heartRate, @calculated,
           @consistent, @calories, @weight, @notes)`
      )
      .run({
        exerciseId,
        order: order?.n ?? 1,
        duration: m.durationMinutes,
        speed: m.speedMph,
        distance: m.distanceMiles,
        incline: data.inclinePercent,
        heartRate: data.avgHeartRate ?? null,
        calculated: m.calculatedField,
        consistent: m.isConsistent ? 1 : 0,
        calories: m.calories,
        weight: m.weightLbs,
        notes: data.notes ?? null,
      });

    const segment = requireSegment(db, Number(info.lastInsertRowid));
    return { segment, exercise: recalculateExercise(db, exerciseId) };
  });
}

/**
 * Updates a segment. The previously derived field is dropped and derived
 * again from the values that were entered, so editing speed on a segment
 * whose distance was calculated recalculates the distance.
 */
export function updateSegment(db: DB, id: number, update: SegmentUpdate, defaultWeightLbs: number): SegmentChange {
  const data = parseInput(segmentUpdateSchema, update);

  return withTransaction(db, () => {
    const existing = requireSegment(db, id);
    const exercise = requireExercise(db, existing.exerciseId);

    const entered = (field: Exclude<CalculatedField, "none">, value: number | null): number | null =>
      existing.calculatedField === field ? null : value;
    const values: SegmentValues = {
      durationMinutes: data.durationMinutes ?? entered("duration", existing.durationMinutes),
      speedMph: data.speedMph ?? entered("speed", existing.speedMph),
      distanceMiles: data.distanceMiles ?? entered("distance", existing.distanceMiles),
      inclinePercent: data.inclinePercent ?? existing.inclinePercent,
    };
    const m = measureSegment(db, exercise, values, defaultWeightLbs);

    db.prepare(
      `UPDATE exercise_segments SET duration_minutes = @duration, speed_mph = @speed, distance_miles = @distance,
         incline_percent = @incline, avg_heart_rate = @heartRate, calculated_field = @calculated,
         is_consistent = @consistent, calories_burned = @calories, weight_used_lbs = @weight, notes = @notes
       WHERE id = @id`
    ).run({
      id,
      duration: m.durationMinutes,
      speed: m.speedMph,
      distance: m.distanceMiles,
      incline: values.inclinePercent,
      heartRate: data.avgHeartRate ?? existing.avgHeartRate,
      calculated: m.calculatedField,
      consistent: m.isConsistent ? 1 : 0,
      calories: m.calories,
      weight: m.weightLbs,
      notes: data.notes === undefined ? existing.notes : data.notes,
    });

    return { segment: requireSegment(db, id), exercise: recalculateExercise(db, existing.exerciseId) };
  });
}

export function deleteSegment(db: DB, id: number): SegmentChange {
  return withTransaction(db, () => {
    const existing = requireSegment(db, id);
    db.prepare<[number]>("DELETE FROM exercise_segments WHERE id = ?").run(id);
    return { segment: existing, exercise: recalculateExercise(db, existing.exerciseId) };
  });
}
