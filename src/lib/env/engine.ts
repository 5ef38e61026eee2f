import { z } from "zod";

export const LOG_LEVELS = ["silent", "error", "warn", "info", "debug"] as const;
export type LogLevel = (typeof LOG_LEVELS)[number];

const EngineEnvSchema = z.object({
  // IRR / XIRR solver
  PROFORMA_IRR_GUESS: z.coerce.number().gt(-1).default(0.1),
  PROFORMA_IRR_TOLERANCE: z.coerce.number().positive().max(0.001).default(1e-7),
  PROFORMA_IRR_MAX_ITERATIONS: z.coerce.number().int().min(1).max(10_000).default(100),

  // Logging
  PROFORMA_LOG_LEVEL: z.enum(LOG_LEVELS).default("info"),
});

export type EngineEnv = z.infer<typeof EngineEnvSchema>;

export function engineEnv(source: NodeJS.ProcessEnv = process.env): EngineEnv {
  const parsed = EngineEnvSchema.safeParse(source);
  if (!parsed.success) {
    // eslint-disable-next-line no-console
    console.error("❌ Invalid engine env:", parsed.error.flatten().fieldErrors);
    throw new Error("Invalid engine environment variables (see logs).");
  }
  return parsed.data;
}
