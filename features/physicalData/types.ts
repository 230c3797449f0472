import type { BiologicalSex } from "@/lib/energyCalculations";

export type UserPhysicalData = Readonly<{
  weightKg: number | null;
  heightCm: number | null;
  ageYears: number | null;
  biologicalSex: BiologicalSex | null;
  bmr: number | null;
  tdee: number | null;
}>;

export type UserPhysicalDataInput = {
  [Key in keyof UserPhysicalData]?: UserPhysicalData[Key];
};
