export type MealType = "breakfast" | "lunch" | "dinner" | "snacks";

export type FoodLogEntry = Readonly<{
  timestamp: Date;
  name: string;
  calories: number;
  protein: number;
  carbohydrates: number;
  fat: number;
  mealType: MealType;
  servingSize: number;
  servingUnit: string;
  barcode: string | null;
  customFoodId: string | null;
}>;

export type FoodLogEntryInput = {
  timestamp?: Date;
  name: string;
  calories: number;
  protein: number;
  carbohydrates: number;
  fat: number;
  mealType: MealType;
  servingSize?: number;
  servingUnit?: string;
  barcode?: string | null;
  customFoodId?: string | null;
};
