import { describe, expect, it, vi } from "vitest";
import type { SupabaseClient } from "@supabase/supabase-js";
import { getUserForAccessToken } from "@/lib/authSession";

type GetUserResult = {
  data: { user: { id: string } | null };
  error: { message: string; status?: number } | null;
};

function mockClient(result: GetUserResult) {
  const getUser = vi.fn().mockResolvedValue(result);
  const client = { auth: { getUser } } as unknown as SupabaseClient;
  return { client, getUser };
}

describe("getUserForAccessToken", () => {
  it("returns the user id for a valid token", async () => {
    const { client, getUser } = mockClient({ data: { user: { id: "u1" } }, error: null });

    await expect(getUserForAccessToken(client, "test-access-token")).resolves.toEqual({ status: "ok", userId: "u1" });
    expect(getUser).toHaveBeenCalledWith("test-access-token");
  });

  it("treats rejected tokens as unauthenticated", async () => {
    const expired = mockClient({ data: { user: null }, error: { message: "invalid JWT: token is expired", status: 401 } });
    const missing = mockClient({ data: { user: null }, error: { message: "Auth session missing!", status: 400 } });

    await expect(getUserForAccessToken(expired.client, "test-access-token")).resolves.toEqual({
      status: "unauthenticated",
    });
    await expect(getUserForAccessToken(missing.client, "test-access-token")).resolves.toEqual({
      status: "unauthenticated",
    });
  });

  it("returns auth service errors", async () => {
    const { client } = mockClient({ data: { user: null }, error: { message: "upstream timeout", status: 504 } });

    await expect(getUserForAccessToken(client, "test-access-token")).resolves.toEqual({
      status: "error",
      message: "upstream timeout",
    });
  });
});
