/**
 * Run configuration schemas
 *
 * Values arrive as strings from CLI flags or environment variables, so the
 * numeric fields coerce.
 */

import { z } from "zod";
import { ValidationError } from "../lib/errors";
import { DEFAULT_BASE_URL, LEAGUES } from "../source/urls";

const positiveInt = z.coerce.number().int().positive();

const booleanFlag = z
  .union([z.boolean(), z.enum(["true", "false", "1", "0"])])
  .transform((value) => value === true || value === "true" || value === "1");

export const FetchConfigSchema = z
  .object({
    season: z.coerce.number().int().min(2000).max(2100).describe("Season start year, e.g. 2024 for 2024/25"),
    league: z.enum(LEAGUES).default("EPL"),
    fromRound: positiveInt.optional(),
    toRound: positiveInt.optional(),
    limitMostRecent: positiveInt.optional().describe("Keep only the most recent N matches"),
    outputPath: z.string().min(1).optional(),
    debug: booleanFlag.default(false),
    debugDir: z.string().min(1).default("."),
    delayMs: z.coerce.number().int().min(0).default(600),
    jitterMs: z.coerce.number().int().min(0).default(400),
    strictOutcomes: booleanFlag.default(false),
    baseUrl: z.string().url().default(DEFAULT_BASE_URL),
  })
  .refine((c) => c.fromRound === undefined || c.toRound === undefined || c.fromRound <= c.toRound, {
    message: "fromRound must not exceed toRound",
    path: ["fromRound"],
  })
  .transform((c) => ({ ...c, outputPath: c.outputPath ?? `data/shots_${c.season}.csv` }));

export type FetchConfigInput = z.input<typeof FetchConfigSchema>;
export type FetchConfig = z.output<typeof FetchConfigSchema>;

export const ChartConfigSchema = z.object({
  csv: z.string().min(1),
  player: z.string().min(1).optional(),
  minShots: z.coerce.number().int().min(1).default(10),
  outDir: z.string().min(1).default("out"),
});

export type ChartConfigInput = z.input<typeof ChartConfigSchema>;
export type ChartConfig = z.output<typeof ChartConfigSchema>;

function formatIssues(error: z.ZodError): string {
  return error.issues.map((issue) => `${issue.path.join(".") || "config"}: ${issue.message}`).join("; ");
}

/**
 * Parse with a schema, turning zod failures into a ValidationError.
 */
export function parseConfig<S extends z.ZodTypeAny>(schema: S, input: unknown): z.output<S> {
  const result = schema.safeParse(input);
  if (!result.success) {
    throw new ValidationError(`invalid configuration: ${formatIssues(result.error)}`, {
      issues: result.error.issues,
    });
  }
  return result.data;
}
