import { readEnv } from "@/lib/env";

/**
 * Structured error reporting utility.
 * Always logs; in production also POSTs to ERROR_ENDPOINT when configured.
 * Never throws and never awaits delivery.
 */
export function reportError(error: Error, context?: Record<string, unknown>): void {
  console.error("[Crimson Error]", error.message, context);

  const { nodeEnv, errorEndpoint } = readEnv();
  if (nodeEnv === "development" || !errorEndpoint) return;

  fetch(errorEndpoint, {
    method: "POST",
    headers: { "Content-Type": "application/json" },
    body: JSON.stringify({
      name: error.name,
      message: error.message,
      stack: error.stack,
      context,
      timestamp: Date.now(),
    }),
  }).catch((err: unknown) => {
    console.debug("[Crimson Error] Report delivery failed:", err);
  });
}
