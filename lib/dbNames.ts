export const TABLES = {
  foodLogs: "food_logs",
  profiles: "profiles",
} as const;
