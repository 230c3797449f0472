import type { SupabaseClient } from "@supabase/supabase-js";

export type AccessTokenUserResult =
  | { status: "ok"; userId: string }
  | { status: "unauthenticated" }
  | { status: "error"; message: string };

function isRejectedToken(error: { message: string; status?: number }) {
  if (error.status === 401 || error.status === 403) return true;
  const message = error.message.toLowerCase();
  return message.includes("jwt") || message.includes("invalid claim") || message.includes("session");
}

export async function getUserForAccessToken(
  client: SupabaseClient,
  accessToken: string
): Promise<AccessTokenUserResult> {
  const { data, error } = await client.auth.getUser(accessToken);
  if (error) {
    if (isRejectedToken(error)) return { status: "unauthenticated" };
    return { status: "error", message: error.message };
  }

  const user = data.user;
  if (!user) {
    return { status: "unauthenticated" };
  }

  return { status: "ok", userId: user.id };
}
