export type NutritionErrorKind =
  | "store_unavailable"
  | "authorization_denied"
  | "network_error"
  | "invalid_barcode"
  | "food_not_found"
  | "invalid_nutrition_data"
  | "persistence_error"
  | "invalid_user_data"
  | "calculation_error";

export type NutritionError = {
  kind: NutritionErrorKind;
  message: string;
  cause?: string;
};

export type StoreResult<T = void> =
  | { ok: true; value: T }
  | { ok: false; error: NutritionError };

export const NUTRITION_ERROR_MESSAGES: Record<NutritionErrorKind, string> = {
  store_unavailable: "Health data storage is not available.",
  authorization_denied: "Permission to access health data is required for this feature.",
  network_error: "Network issue while reaching health data storage.",
  invalid_barcode: "Invalid or unrecognized barcode.",
  food_not_found: "Food item not found in database.",
  invalid_nutrition_data: "Invalid nutrition data provided.",
  persistence_error: "Could not save or load nutrition data.",
  invalid_user_data: "Invalid user data for calculations.",
  calculation_error: "Error performing nutrition calculations.",
};

export const NUTRITION_ERROR_RECOVERY: Record<NutritionErrorKind, string> = {
  store_unavailable: "Enter your physical data manually.",
  authorization_denied: "Sign in again to grant access to your health data.",
  network_error: "Check your connection and try again.",
  invalid_barcode: "Scan the barcode again or search for the food manually.",
  food_not_found: "Search with different keywords or create a custom food.",
  invalid_nutrition_data: "Check that all nutrition values are valid numbers.",
  persistence_error: "Please try again.",
  invalid_user_data: "Complete your profile with valid physical data.",
  calculation_error: "Verify your input data and try again.",
};

export function createNutritionError(kind: NutritionErrorKind, cause?: string): NutritionError {
  const error: NutritionError = { kind, message: NUTRITION_ERROR_MESSAGES[kind] };
  if (cause) error.cause = cause;
  return error;
}

export function storeOk<T>(value: T): StoreResult<T> {
  return { ok: true, value };
}

export function storeFailure<T = void>(kind: NutritionErrorKind, cause?: string): StoreResult<T> {
  return { ok: false, error: createNutritionError(kind, cause) };
}

type StoreErrorShape = {
  message?: string;
  status?: number;
  code?: string;
};

function asLower(value: string | undefined) {
  return (value ?? "").toLowerCase();
}

export function classifyStoreError(error: StoreErrorShape): NutritionErrorKind {
  const message = asLower(error.message);
  const status = error.status;

  const isNetworkFailure =
    status === 0 ||
    message.includes("failed to fetch") ||
    message.includes("fetch failed") ||
    message.includes("network request failed") ||
    message.includes("network error");

  if (isNetworkFailure) {
    return "network_error";
  }

  const isAuthorizationFailure =
    status === 401 ||
    status === 403 ||
    error.code === "42501" ||
    message.includes("jwt") ||
    message.includes("permission denied") ||
    message.includes("row-level security");

  if (isAuthorizationFailure) {
    return "authorization_denied";
  }

  return "persistence_error";
}
