export type BiologicalSex = "male" | "female" | "other";
export type ActivityLevel =
  | "sedentary"
  | "lightly_active"
  | "moderately_active"
  | "very_active"
  | "extremely_active";
export type NutritionGoal = "cut" | "maintain" | "bulk";

export const MINIMUM_BMR_KCAL = 1000;

export const ACTIVITY_MULTIPLIERS: Record<ActivityLevel, number> = {
  sedentary: 1.2,
  lightly_active: 1.375,
  moderately_active: 1.55,
  very_active: 1.725,
  extremely_active: 1.9,
};

const SEX_ADJUSTMENTS: Record<Exclude<BiologicalSex, "other">, number> = {
  male: 5,
  female: -161,
};

export const GOAL_CALORIE_ADJUSTMENTS: Record<NutritionGoal, number> = {
  cut: -500,
  maintain: 0,
  bulk: 300,
};

export type MacroSplit = {
  protein: number;
  carbohydrates: number;
  fat: number;
};

export const MACRO_SPLITS: Record<NutritionGoal, MacroSplit> = {
  cut: { protein: 0.35, carbohydrates: 0.4, fat: 0.25 },
  maintain: { protein: 0.25, carbohydrates: 0.45, fat: 0.3 },
  bulk: { protein: 0.2, carbohydrates: 0.55, fat: 0.25 },
};

const KCAL_PER_GRAM = {
  protein: 4,
  carbohydrates: 4,
  fat: 9,
} as const;

function getSexAdjustment(sex: BiologicalSex) {
  if (sex === "other") {
    return (SEX_ADJUSTMENTS.male + SEX_ADJUSTMENTS.female) / 2;
  }
  return SEX_ADJUSTMENTS[sex];
}

/**
 * Mifflin-St Jeor BMR in kcal/day. "other" uses the midpoint of the male and
 * female equations. The floor is applied once, to the final value.
 */
export function calculateBmrMifflinStJeor(input: {
  sex: BiologicalSex;
  weightKg: number;
  heightCm: number;
  ageYears: number;
}) {
  const base = (10 * input.weightKg) + (6.25 * input.heightCm) - (5 * input.ageYears);
  return Math.max(base + getSexAdjustment(input.sex), MINIMUM_BMR_KCAL);
}

export function calculateTdee(input: {
  bmr: number;
  activityLevel: ActivityLevel;
}) {
  return input.bmr * ACTIVITY_MULTIPLIERS[input.activityLevel];
}

export function calculateAgeYearsFromBirthDate(birthDateIso: string, referenceDate = new Date()) {
  const birthDate = new Date(`${birthDateIso}T00:00:00`);
  if (!Number.isFinite(birthDate.getTime())) return null;

  const years = referenceDate.getFullYear() - birthDate.getFullYear();
  const monthDiff = referenceDate.getMonth() - birthDate.getMonth();
  const dayDiff = referenceDate.getDate() - birthDate.getDate();
  const hadBirthdayThisYear = monthDiff > 0 || (monthDiff === 0 && dayDiff >= 0);
  const age = hadBirthdayThisYear ? years : years - 1;
  return age >= 0 ? age : null;
}

export type NutritionTargets = {
  dailyCalories: number;
  proteinG: number;
  carbohydratesG: number;
  fatG: number;
};

export function calculateNutritionTargets(input: {
  tdee: number;
  goal: NutritionGoal;
}): NutritionTargets {
  const dailyCalories = input.tdee + GOAL_CALORIE_ADJUSTMENTS[input.goal];
  const split = MACRO_SPLITS[input.goal];

  return {
    dailyCalories,
    proteinG: (dailyCalories * split.protein) / KCAL_PER_GRAM.protein,
    carbohydratesG: (dailyCalories * split.carbohydrates) / KCAL_PER_GRAM.carbohydrates,
    fatG: (dailyCalories * split.fat) / KCAL_PER_GRAM.fat,
  };
}

export function calculateMacroCalories(macros: { protein: number; carbohydrates: number; fat: number }) {
  return (
    (macros.protein * KCAL_PER_GRAM.protein) +
    (macros.carbohydrates * KCAL_PER_GRAM.carbohydrates) +
    (macros.fat * KCAL_PER_GRAM.fat)
  );
}
