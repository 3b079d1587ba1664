import { describe, test, expect, beforeEach } from "vitest";
import type { DB } from "../../src/db.js";
import {
  addExercise,
  addSegment,
  deleteExercise,
  deleteSegment,
  getExerciseDetail,
  latestBodyWeight,
  recordBodyWeight,
  updateSegment,
} from "../../src/db/exercises.js";
import { getDayDetail } from "../../src/db/meals.js";
import { getDayByDate } from "../../src/db/store.js";
import { baseMet, caloriesBurned, deriveMissing } from "../../src/engine/exercise.js";
import { NotFoundError, ValidationError } from "../../src/errors.js";
import { memoryDb } from "../helpers.js";

describe("Exercise calorie model", () => {
  describe("deriveMissing", () => {
    test("should derive distance from duration and speed", () => {
      expect(deriveMissing(30, 3, null)).toEqual({
        durationMinutes: 30,
        speedMph: 3,
        distanceMiles: 1.5,
        calculatedField: "distance",
        isConsistent: true,
      });
    });

    test("should derive speed from duration and distance", () => {
      const m = deriveMissing(45, null, 3);
      expect(m.calculatedField).toBe("speed");
      expect(m.speedMph).toBe(4);
    });

    test("should derive duration from speed and distance", () => {
      const m = deriveMissing(null, 4, 2);
      expect(m.calculatedField).toBe("duration");
      expect(m.durationMinutes).toBe(30);
    });

    test("should flag inconsistent values outside 1% tolerance", () => {
      expect(deriveMissing(30, 3, 1.505).isConsistent).toBe(true);
      expect(deriveMissing(30, 3, 1.6).isConsistent).toBe(false);
      expect(deriveMissing(30, 3, 1.6).calculatedField).toBe("none");
    });
  });

  describe("caloriesBurned", () => {
    test("30 minutes at 3.0 mph and 2% incline for 150 lb burns 125.9 calories", () => {
      expect(baseMet(3.0)).toBe(3.5);
      expect(caloriesBurned(30, 3.0, 2, 150)).toBe(125.9);
    });

    test("should step through the MET table", () => {
      expect(baseMet(1.5)).toBe(2.0);
      expect(baseMet(4.2)).toBe(5.0);
      expect(baseMet(6.5)).toBe(9.8);
      expect(baseMet(12)).toBe(11.5);
    });

    test("should be zero without a positive duration and speed", () => {
      expect(caloriesBurned(0, 3, 0, 150)).toBe(0);
      expect(caloriesBurned(30, null, 0, 150)).toBe(0);
    });
  });
});

describe("Exercise records", () => {
  let db: DB;

  beforeEach(() => {
    db = memoryDb();
  });

  test("segments roll up into the exercise and the day", () => {
    const { exercise } = addExercise(db, { date: "2024-05-01", exerciseType: "tm" });
    expect(exercise.exerciseType).toBe("treadmill");

    const first = addSegment(db, exercise.id, { durationMinutes: 30, speedMph: 3, inclinePercent: 2 }, 150);
    expect(first.segment.segmentOrder).toBe(1);
    expect(first.segment.distanceMiles).toBe(1.5);
    expect(first.segment.calculatedField).toBe("distance");
    expect(first.segment.caloriesBurned).toBe(125.9);
    expect(first.segment.weightUsedLbs).toBe(150);

    // 10 minutes at 4.5 mph: MET 6.0 -> 6.0 x 68.0388 x (10/60) = 68.0388
    const second = addSegment(db, exercise.id, { durationMinutes: 10, distanceMiles: 0.75 }, 150);
    expect(second.segment.segmentOrder).toBe(2);
    expect(second.segment.speedMph).toBeCloseTo(4.5, 9);
    expect(second.segment.caloriesBurned).toBe(68);

    expect(second.exercise.durationMinutes).toBe(40);
    expect(second.exercise.distanceMiles).toBe(2.25);
    expect(second.exercise.caloriesBurned).toBe(193.9);
    expect(getDayByDate(db, "2024-05-01")?.caloriesBurned).toBe(193.9);

    deleteSegment(db, first.segment.id);
    expect(getDayByDate(db, "2024-05-01")?.caloriesBurned).toBe(68);

    deleteExercise(db, exercise.id);
    expect(getDayByDate(db, "2024-05-01")?.caloriesBurned).toBe(0);
    expect(() => getExerciseDetail(db, exercise.id)).toThrow(NotFoundError);
  });

  test("should use the latest body weight on or before the exercise date", () => {
    recordBodyWeight(db, { weightLbs: 200, date: "2024-04-01" });
    recordBodyWeight(db, { weightLbs: 180, date: "2024-06-01" });
    expect(latestBodyWeight(db, "2024-05-01")).toBe(200);
    expect(latestBodyWeight(db, "2024-03-01")).toBeNull();

    const { exercise } = addExercise(db, { date: "2024-05-01", exerciseType: "treadmill" });
    const { segment } = addSegment(db, exercise.id, { durationMinutes: 30, speedMph: 3, inclinePercent: 2 }, 150);
    // 3.7 x (200 x 0.453592) x 0.5 = 167.82904
    expect(segment.weightUsedLbs).toBe(200);
    expect(segment.caloriesBurned).toBe(167.8);
  });

  test("should require two of duration, speed and distance", () => {
    const { exercise } = addExercise(db, { date: "2024-05-01", exerciseType: "treadmill" });
    expect(() => addSegment(db, exercise.id, { durationMinutes: 30 }, 150)).toThrow(ValidationError);
    expect(() => addSegment(db, exercise.id, { durationMinutes: 30, speedMph: 3, inclinePercent: 50 }, 150)).toThrow(
      ValidationError
    );
    expect(getExerciseDetail(db, exercise.id).segments).toEqual([]);
  });

  test("updating a segment re-derives the calculated field", () => {
    const { exercise } = addExercise(db, { date: "2024-05-01", exerciseType: "treadmill" });
    const { segment } = addSegment(db, exercise.id, { durationMinutes: 30, speedMph: 3 }, 150);
    expect(segment.distanceMiles).toBe(1.5);

    const updated = updateSegment(db, segment.id, { speedMph: 4 }, 150);
    expect(updated.segment.distanceMiles).toBe(2);
    expect(updated.segment.calculatedField).toBe("distance");
    expect(updated.exercise.distanceMiles).toBe(2);
  });

  test("day detail reports net calories", () => {
    const { exercise } = addExercise(db, { date: "2024-05-01", exerciseType: "treadmill" });
    addSegment(db, exercise.id, { durationMinutes: 30, speedMph: 3, inclinePercent: 2 }, 150);
    const detail = getDayDetail(db, "2024-05-01");
    expect(detail.exercises).toHaveLength(1);
    expect(detail.netCalories).toBe(-125.9);
  });
});
