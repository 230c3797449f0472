import type { ActivityLevel, BiologicalSex, NutritionGoal } from "@/lib/energyCalculations";

export const BIOLOGICAL_SEX_LABELS: Record<BiologicalSex, string> = {
  male: "Male",
  female: "Female",
  other: "Other",
};

export const ACTIVITY_LEVEL_LABELS: Record<ActivityLevel, string> = {
  sedentary: "Sedentary",
  lightly_active: "Lightly Active",
  moderately_active: "Moderately Active",
  very_active: "Very Active",
  extremely_active: "Extremely Active",
};

export const ACTIVITY_LEVEL_DESCRIPTIONS: Record<ActivityLevel, string> = {
  sedentary: "Little or no exercise",
  lightly_active: "Light exercise 1-3 days/week",
  moderately_active: "Moderate exercise 3-5 days/week",
  very_active: "Hard exercise 6-7 days/week",
  extremely_active: "Very hard exercise, physical job",
};

export const NUTRITION_GOAL_LABELS: Record<NutritionGoal, string> = {
  cut: "Cut (Lose Weight)",
  maintain: "Maintain Weight",
  bulk: "Bulk (Gain Weight)",
};
