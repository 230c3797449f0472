import {
  calculateNutritionTargets,
  type ActivityLevel,
  type NutritionGoal,
  type NutritionTargets,
} from "@/lib/energyCalculations";
import {
  ACTIVITY_LEVEL_DESCRIPTIONS,
  ACTIVITY_LEVEL_LABELS,
  NUTRITION_GOAL_LABELS,
} from "@/lib/energyLabels";
import { createNutritionError, type NutritionError } from "@/lib/nutritionErrors";
import { logServerError, logServerEvent } from "@/lib/monitoring";
import type { FoodLogEntry } from "@/features/foodLog/types";
import { validateFoodLogEntry } from "@/features/foodLog/utils";
import type { HealthDataStore } from "@/features/healthStore/types";
import { hasCompleteData, withEnergyEstimates } from "@/features/physicalData/physicalData";
import type { UserPhysicalData } from "@/features/physicalData/types";

type LogFoodStore = Pick<HealthDataStore, "isDataAvailable" | "requestAuthorization" | "writeNutritionEntry">;
type EnergyProfileStore = Pick<HealthDataStore, "isDataAvailable" | "fetchUserPhysicalData">;

export type NutritionPlan = {
  activityLevel: ActivityLevel;
  activityLabel: string;
  activityDescription: string;
  goal: NutritionGoal;
  goalLabel: string;
  bmr: number;
  tdee: number;
  targets: NutritionTargets;
};

function reportFailure(event: string, error: NutritionError, context: Record<string, unknown>) {
  logServerError(event, error, { kind: error.kind, cause: error.cause ?? null, ...context });
}

export async function logFoodEntryWorkflow(
  store: LogFoodStore,
  entry: FoodLogEntry
): Promise<{ status: "saved" } | { status: "error"; error: NutritionError }> {
  const validationError = validateFoodLogEntry(entry);
  if (validationError) {
    return { status: "error", error: validationError };
  }

  if (!store.isDataAvailable()) {
    return { status: "error", error: createNutritionError("store_unavailable") };
  }

  const authorization = await store.requestAuthorization();
  if (!authorization.ok) {
    reportFailure("nutrition.authorize_failed", authorization.error, { mealType: entry.mealType });
    return { status: "error", error: authorization.error };
  }

  const written = await store.writeNutritionEntry(entry);
  if (!written.ok) {
    reportFailure("nutrition.write_failed", written.error, {
      mealType: entry.mealType,
      calories: entry.calories,
    });
    return { status: "error", error: written.error };
  }

  logServerEvent("nutrition.entry_saved", { mealType: entry.mealType, calories: entry.calories });
  return { status: "saved" };
}

/**
 * Loads measurements from the store and attaches BMR/TDEE estimates. An
 * incomplete profile is not an error: the caller gets the partial record back
 * and decides whether to ask the user for the missing fields.
 */
export async function loadEnergyProfileWorkflow(
  store: EnergyProfileStore,
  activityLevel: ActivityLevel
): Promise<
  | { status: "ready"; data: UserPhysicalData }
  | { status: "incomplete"; data: UserPhysicalData }
  | { status: "error"; error: NutritionError }
> {
  if (!store.isDataAvailable()) {
    return { status: "error", error: createNutritionError("store_unavailable") };
  }

  const fetched = await store.fetchUserPhysicalData();
  if (!fetched.ok) {
    reportFailure("nutrition.physical_data_failed", fetched.error, { activityLevel });
    return { status: "error", error: fetched.error };
  }

  if (!hasCompleteData(fetched.value)) {
    return { status: "incomplete", data: fetched.value };
  }

  return { status: "ready", data: withEnergyEstimates(fetched.value, activityLevel) };
}

export async function buildNutritionPlanWorkflow(
  store: EnergyProfileStore,
  activityLevel: ActivityLevel,
  goal: NutritionGoal
): Promise<
  | { status: "ready"; plan: NutritionPlan }
  | { status: "incomplete"; data: UserPhysicalData }
  | { status: "error"; error: NutritionError }
> {
  const profile = await loadEnergyProfileWorkflow(store, activityLevel);
  if (profile.status !== "ready") return profile;

  const { bmr, tdee } = profile.data;
  if (bmr == null || tdee == null) {
    const error = createNutritionError("calculation_error", "Energy estimates are missing for a complete profile.");
    reportFailure("nutrition.plan_failed", error, { activityLevel, goal });
    return { status: "error", error };
  }

  return {
    status: "ready",
    plan: {
      activityLevel,
      activityLabel: ACTIVITY_LEVEL_LABELS[activityLevel],
      activityDescription: ACTIVITY_LEVEL_DESCRIPTIONS[activityLevel],
      goal,
      goalLabel: NUTRITION_GOAL_LABELS[goal],
      bmr,
      tdee,
      targets: calculateNutritionTargets({ tdee, goal }),
    },
  };
}
