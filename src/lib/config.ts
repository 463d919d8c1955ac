import { z } from "zod";
import { ConfigError } from "./errors";

export const supportedFluids = ["R410A"] as const;

export type FluidName = (typeof supportedFluids)[number];

const logLevelSchema = z.enum(["error", "warn", "info", "debug"]);

const defaultLogLevel = (): z.infer<typeof logLevelSchema> => {
  const parsed = logLevelSchema.safeParse(process.env.LOG_LEVEL);
  return parsed.success ? parsed.data : "info";
};

const steadyStateSchema = z
  .object({
    stdThresholdHz: z.number().positive().default(2),
    thresholdsMinutes: z.array(z.number().finite().nonnegative()).min(2).default([1, 30, 60]),
    includeBelow: z.boolean().default(true),
    includeAbove: z.boolean().default(true)
  })
  .strict();

const frequencySchema = z
  .object({
    sentinels: z.array(z.string().min(1)).default(["UnderRange", "OverRange"]),
    scale: z.number().positive().default(0.5)
  })
  .strict();

export const analysisConfigSchema = z
  .object({
    fluid: z.enum(supportedFluids).default("R410A"),
    atmosphericPressurePa: z.number().positive().default(101325),
    frequency: frequencySchema.default({}),
    steadyState: steadyStateSchema.default({}),
    conditionKeywords: z
      .array(z.string().min(1))
      .default(["load", "aux", "setpoint", "|", "PdT"]),
    logLevel: logLevelSchema.default(defaultLogLevel)
  })
  .strict();

export type AnalysisConfig = z.infer<typeof analysisConfigSchema>;

export type AnalysisConfigInput = z.input<typeof analysisConfigSchema>;

export const loadAnalysisConfig = (overrides: AnalysisConfigInput = {}): Readonly<AnalysisConfig> => {
  const parsed = analysisConfigSchema.safeParse(overrides);
  if (!parsed.success) {
    const summary = parsed.error.issues
      .map((issue) => `${issue.path.join(".") || "config"}: ${issue.message}`)
      .join("; ");
    throw new ConfigError(`Invalid analysis configuration (${summary}).`, parsed.error.issues);
  }
  return Object.freeze(parsed.data);
};
