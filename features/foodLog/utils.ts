import { calculateMacroCalories } from "@/lib/energyCalculations";
import { createNutritionError, type NutritionError } from "@/lib/nutritionErrors";
import { formatTrimmedDecimal } from "@/lib/numberFormat";
import type { FoodLogEntry, FoodLogEntryInput, MealType } from "@/features/foodLog/types";

export const MEAL_TYPE_LABELS: Record<MealType, string> = {
  breakfast: "Breakfast",
  lunch: "Lunch",
  dinner: "Dinner",
  snacks: "Snacks",
};

export const MEAL_TYPE_SORT_ORDER: Record<MealType, number> = {
  breakfast: 0,
  lunch: 1,
  dinner: 2,
  snacks: 3,
};

const MACRO_TOLERANCE = 0.1;

export function createFoodLogEntry(input: FoodLogEntryInput): FoodLogEntry {
  return Object.freeze({
    timestamp: input.timestamp ?? new Date(),
    name: input.name,
    calories: input.calories,
    protein: input.protein,
    carbohydrates: input.carbohydrates,
    fat: input.fat,
    mealType: input.mealType,
    servingSize: input.servingSize ?? 1,
    servingUnit: input.servingUnit ?? "serving",
    barcode: input.barcode ?? null,
    customFoodId: input.customFoodId ?? null,
  });
}

export function getTotalMacroCalories(entry: FoodLogEntry) {
  return calculateMacroCalories(entry);
}

export function hasValidMacros(entry: FoodLogEntry) {
  if (!(entry.calories > 0)) return false;
  const difference = Math.abs(entry.calories - getTotalMacroCalories(entry));
  return difference / entry.calories <= MACRO_TOLERANCE;
}

export function isQuickAdd(entry: FoodLogEntry) {
  return entry.barcode == null && entry.customFoodId == null;
}

export function formatServing(entry: FoodLogEntry) {
  return `${formatTrimmedDecimal(entry.servingSize, 3)} ${entry.servingUnit}`;
}

function isNonNegativeNumber(value: number) {
  return Number.isFinite(value) && value >= 0;
}

export function validateFoodLogEntry(entry: FoodLogEntry): NutritionError | null {
  if (!entry.name.trim()) {
    return createNutritionError("invalid_nutrition_data", "Food name is required.");
  }

  const nutrients = {
    calories: entry.calories,
    protein: entry.protein,
    carbohydrates: entry.carbohydrates,
    fat: entry.fat,
  };
  for (const [field, value] of Object.entries(nutrients)) {
    if (!isNonNegativeNumber(value)) {
      return createNutritionError("invalid_nutrition_data", `${field} must be 0 or greater.`);
    }
  }

  if (!Number.isFinite(entry.servingSize) || entry.servingSize <= 0) {
    return createNutritionError("invalid_nutrition_data", "Serving size must be greater than 0.");
  }

  if (!Number.isFinite(entry.timestamp.getTime())) {
    return createNutritionError("invalid_nutrition_data", "Timestamp must be a valid date.");
  }

  return null;
}
