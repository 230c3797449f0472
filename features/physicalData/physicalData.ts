import {
  calculateBmrMifflinStJeor,
  calculateTdee,
  type ActivityLevel,
} from "@/lib/energyCalculations";
import { BIOLOGICAL_SEX_LABELS } from "@/lib/energyLabels";
import { formatTrimmedDecimal } from "@/lib/numberFormat";
import type { UserPhysicalData, UserPhysicalDataInput } from "@/features/physicalData/types";

export function createUserPhysicalData(input: UserPhysicalDataInput = {}): UserPhysicalData {
  return Object.freeze({
    weightKg: input.weightKg ?? null,
    heightCm: input.heightCm ?? null,
    ageYears: input.ageYears ?? null,
    biologicalSex: input.biologicalSex ?? null,
    bmr: input.bmr ?? null,
    tdee: input.tdee ?? null,
  });
}

export function hasCompleteData(data: UserPhysicalData) {
  return (
    data.weightKg != null &&
    data.heightCm != null &&
    data.ageYears != null &&
    data.biologicalSex != null
  );
}

export function formatWeight(data: UserPhysicalData) {
  if (data.weightKg == null) return null;
  return `${data.weightKg.toFixed(1)} kg`;
}

export function formatHeight(data: UserPhysicalData) {
  if (data.heightCm == null) return null;
  return `${formatTrimmedDecimal(data.heightCm, 2)} cm`;
}

export function formatAge(data: UserPhysicalData) {
  if (data.ageYears == null) return null;
  return `${data.ageYears} years`;
}

export function formatBiologicalSex(data: UserPhysicalData) {
  if (data.biologicalSex == null) return null;
  return BIOLOGICAL_SEX_LABELS[data.biologicalSex];
}

/**
 * TDEE from the record's stored BMR. Returns null when BMR is missing, even if
 * the measurements needed to derive it are present.
 */
export function calculateTdeeForPhysicalData(data: UserPhysicalData, activityLevel: ActivityLevel) {
  if (data.bmr == null) return null;
  return calculateTdee({ bmr: data.bmr, activityLevel });
}

function deriveBmr(data: UserPhysicalData) {
  if (
    data.weightKg == null ||
    data.heightCm == null ||
    data.ageYears == null ||
    data.biologicalSex == null
  ) {
    return data.bmr;
  }

  return calculateBmrMifflinStJeor({
    sex: data.biologicalSex,
    weightKg: data.weightKg,
    heightCm: data.heightCm,
    ageYears: data.ageYears,
  });
}

export function withEnergyEstimates(data: UserPhysicalData, activityLevel: ActivityLevel): UserPhysicalData {
  const withBmr = createUserPhysicalData({ ...data, bmr: deriveBmr(data) });
  return createUserPhysicalData({
    ...withBmr,
    tdee: calculateTdeeForPhysicalData(withBmr, activityLevel) ?? data.tdee,
  });
}
