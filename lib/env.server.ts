type SupabaseEnvName = "SUPABASE_URL" | "SUPABASE_ANON_KEY";

function getRequiredServerEnv(name: SupabaseEnvName) {
  const value = process.env[name];
  if (!value) {
    throw new Error(`Missing required environment variable: ${name}`);
  }

  if (name === "SUPABASE_ANON_KEY" && (value.includes("service_role") || value.startsWith("sb_secret_"))) {
    throw new Error("Unsafe Supabase key detected in SUPABASE_ANON_KEY. Use the publishable/anon key only.");
  }

  return value;
}

export function isSupabaseEnvConfigured() {
  return Boolean(process.env.SUPABASE_URL && process.env.SUPABASE_ANON_KEY);
}

export function getSupabaseEnv() {
  return {
    url: getRequiredServerEnv("SUPABASE_URL"),
    anonKey: getRequiredServerEnv("SUPABASE_ANON_KEY"),
  };
}
