import type { SupabaseClient } from "@supabase/supabase-js";
import { createUserSupabaseClient } from "@/lib/supabaseClient";
import { getUserForAccessToken } from "@/lib/authSession";
import { TABLES } from "@/lib/dbNames";
import { isSupabaseEnvConfigured } from "@/lib/env.server";
import { calculateAgeYearsFromBirthDate, type BiologicalSex } from "@/lib/energyCalculations";
import {
  classifyStoreError,
  storeFailure,
  storeOk,
  type StoreResult,
} from "@/lib/nutritionErrors";
import { createUserPhysicalData } from "@/features/physicalData/physicalData";
import type { UserPhysicalData } from "@/features/physicalData/types";
import type { FoodLogEntry } from "@/features/foodLog/types";
import type { FoodLogRow, HealthDataStore, ProfilePhysicalRow } from "@/features/healthStore/types";

type SupabaseErrorLike = { message: string; code?: string };

export type SupabaseHealthStoreOptions = {
  /** Access token of the signed-in user; `null` when nobody is signed in. */
  getAccessToken: () => string | null | Promise<string | null>;
  now?: () => Date;
};

type UserScope = { client: SupabaseClient; userId: string };

const CONFIGURATION_ERROR_MARKERS = ["missing required environment variable", "unsafe supabase key"];

function toNullableNumber(value: unknown) {
  if (value == null) return null;
  const num = Number(value);
  return Number.isFinite(num) ? num : null;
}

function toNullableString(value: unknown) {
  return typeof value === "string" && value.length > 0 ? value : null;
}

function normalizeSex(value: string | null): BiologicalSex | null {
  if (value === "male" || value === "female" || value === "other") return value;
  return null;
}

function toProfilePhysicalRow(value: unknown): ProfilePhysicalRow | null {
  if (!value || typeof value !== "object") return null;
  const row: Record<string, unknown> = { ...value };
  return {
    weight_kg: toNullableNumber(row.weight_kg),
    height_cm: toNullableNumber(row.height_cm),
    birth_date: toNullableString(row.birth_date),
    sex: toNullableString(row.sex),
  };
}

function describeThrown(error: unknown) {
  if (error instanceof Error) return error.message;
  return String(error);
}

function failureFromThrown<T>(error: unknown): StoreResult<T> {
  const message = describeThrown(error);
  const lowered = message.toLowerCase();
  if (CONFIGURATION_ERROR_MARKERS.some((marker) => lowered.includes(marker))) {
    return storeFailure<T>("store_unavailable", message);
  }
  return storeFailure<T>(classifyStoreError({ message }), message);
}

function failureFromSupabase<T>(error: SupabaseErrorLike, status: number): StoreResult<T> {
  const kind = classifyStoreError({ message: error.message, code: error.code, status });
  return storeFailure<T>(kind, error.message);
}

export function toFoodLogRow(userId: string, entry: FoodLogEntry): FoodLogRow {
  return {
    user_id: userId,
    logged_at: entry.timestamp.toISOString(),
    name: entry.name.trim(),
    calories_kcal: entry.calories,
    protein_g: entry.protein,
    carbohydrates_g: entry.carbohydrates,
    fat_g: entry.fat,
    meal_type: entry.mealType,
    serving_size: entry.servingSize,
    serving_unit: entry.servingUnit,
    barcode: entry.barcode,
    custom_food_id: entry.customFoodId,
  };
}

export function toUserPhysicalData(row: ProfilePhysicalRow | null, referenceDate = new Date()): UserPhysicalData {
  if (!row) return createUserPhysicalData();

  const weightKg = row.weight_kg != null && row.weight_kg > 0 ? row.weight_kg : null;
  const heightCm = row.height_cm != null && row.height_cm > 0 ? row.height_cm : null;
  const ageYears = row.birth_date ? calculateAgeYearsFromBirthDate(row.birth_date, referenceDate) : null;

  return createUserPhysicalData({
    weightKg,
    heightCm,
    ageYears,
    biologicalSex: normalizeSex(row.sex),
  });
}

async function resolveUserScope(accessToken: string | null): Promise<StoreResult<UserScope>> {
  if (!accessToken) {
    return storeFailure<UserScope>("authorization_denied", "Not logged in.");
  }

  const client = createUserSupabaseClient(accessToken);
  const authState = await getUserForAccessToken(client, accessToken);
  if (authState.status === "error") {
    return storeFailure<UserScope>("store_unavailable", authState.message);
  }

  if (authState.status === "unauthenticated") {
    return storeFailure<UserScope>("authorization_denied", "Session expired or invalid.");
  }

  return storeOk({ client, userId: authState.userId });
}

export function createSupabaseHealthStore(options: SupabaseHealthStoreOptions): HealthDataStore {
  const now = options.now ?? (() => new Date());

  async function withUser<T>(run: (scope: UserScope) => Promise<StoreResult<T>>): Promise<StoreResult<T>> {
    if (!isSupabaseEnvConfigured()) {
      return storeFailure<T>("store_unavailable", "Supabase environment is not configured.");
    }

    try {
      const scope = await resolveUserScope(await options.getAccessToken());
      if (!scope.ok) return scope;
      return await run(scope.value);
    } catch (error) {
      return failureFromThrown<T>(error);
    }
  }

  return {
    isDataAvailable() {
      return isSupabaseEnvConfigured();
    },

    requestAuthorization() {
      return withUser(async (): Promise<StoreResult> => storeOk(undefined));
    },

    writeNutritionEntry(entry) {
      return withUser(async ({ client, userId }): Promise<StoreResult> => {
        const { error, status } = await client.from(TABLES.foodLogs).insert(toFoodLogRow(userId, entry));

        if (error) return failureFromSupabase(error, status);
        return storeOk(undefined);
      });
    },

    fetchUserPhysicalData() {
      return withUser(async ({ client, userId }) => {
        const { data, error, status } = await client
          .from(TABLES.profiles)
          .select("weight_kg,height_cm,birth_date,sex")
          .eq("id", userId)
          .maybeSingle();

        if (error) return failureFromSupabase<UserPhysicalData>(error, status);
        return storeOk(toUserPhysicalData(toProfilePhysicalRow(data), now()));
      });
    },
  };
}
