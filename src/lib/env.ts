// Typed environment variable access.
// Everything is optional: without Supabase credentials projects live in memory,
// without an error endpoint failures are only logged.
// Read at call time so tests can stub variables per case.

import { DEFAULT_ACCENT_COLOR, isHexColor, resolveAccentColor } from "@/lib/site/synthesize";

function optionalEnv(name: string): string | undefined {
  return process.env[name] || undefined;
}

export interface Env {
  nodeEnv: string;
  supabaseUrl: string | undefined;
  supabaseServiceRoleKey: string | undefined;
  accentColor: string;
  errorEndpoint: string | undefined;
}

export function readEnv(): Env {
  const accent = optionalEnv("SITE_ACCENT_COLOR");
  if (accent && !isHexColor(accent)) {
    console.warn(`[Env] SITE_ACCENT_COLOR "${accent}" is not a hex color, using ${DEFAULT_ACCENT_COLOR}`);
  }

  return {
    nodeEnv: optionalEnv("NODE_ENV") ?? "development",
    supabaseUrl: optionalEnv("SUPABASE_URL"),
    supabaseServiceRoleKey: optionalEnv("SUPABASE_SERVICE_ROLE_KEY"),
    accentColor: resolveAccentColor(accent),
    errorEndpoint: optionalEnv("ERROR_ENDPOINT"),
  };
}

export function isSupabaseConfigured(): boolean {
  const { supabaseUrl, supabaseServiceRoleKey } = readEnv();
  return !!(supabaseUrl && supabaseServiceRoleKey);
}
