import type { StoreResult } from "@/lib/nutritionErrors";
import type { FoodLogEntry } from "@/features/foodLog/types";
import type { UserPhysicalData } from "@/features/physicalData/types";

/**
 * Boundary to wherever health and nutrition data live. Failures come back as
 * `{ ok: false }` results rather than rejected promises.
 */
export interface HealthDataStore {
  isDataAvailable(): boolean;
  requestAuthorization(): Promise<StoreResult>;
  writeNutritionEntry(entry: FoodLogEntry): Promise<StoreResult>;
  fetchUserPhysicalData(): Promise<StoreResult<UserPhysicalData>>;
}

export type FoodLogRow = {
  user_id: string;
  logged_at: string;
  name: string;
  calories_kcal: number;
  protein_g: number;
  carbohydrates_g: number;
  fat_g: number;
  meal_type: string;
  serving_size: number;
  serving_unit: string;
  barcode: string | null;
  custom_food_id: string | null;
};

export type ProfilePhysicalRow = {
  weight_kg: number | null;
  height_cm: number | null;
  birth_date: string | null;
  sex: string | null;
};
