/**
 * Shot table persistence (CSV)
 *
 * Written with a header row in canonical column order and no index column.
 * Reading back only requires the columns the chart builders use.
 */

import { mkdir, readFile, writeFile } from "node:fs/promises";
import { dirname } from "node:path";
import { parse } from "csv-parse/sync";
import { stringify } from "csv-stringify/sync";
import { REQUIRED_CHART_COLUMNS, SHOT_COLUMNS, type Shot } from "@shotmaps/shared";
import { ValidationError } from "../lib/errors";
import { ChartShotSchema, type ChartShot } from "../schemas/shotRow";

export function formatShotTable(shots: readonly Shot[]): string {
  return stringify([...shots], {
    header: true,
    columns: [...SHOT_COLUMNS],
    cast: {
      boolean: (value) => (value ? "true" : "false"),
    },
  });
}

export async function writeShotTable(path: string, shots: readonly Shot[]): Promise<void> {
  await mkdir(dirname(path), { recursive: true });
  await writeFile(path, formatShotTable(shots), "utf-8");
}

/**
 * Parse CSV text into chart rows. Missing required columns or a row whose
 * numeric fields do not parse is a ValidationError.
 */
export function parseShotTable(text: string): ChartShot[] {
  let header: string[] = [];
  const records: Record<string, string>[] = parse(text, {
    columns: (names: string[]) => {
      header = names;
      return names;
    },
    skip_empty_lines: true,
    bom: true,
  });

  const missing = REQUIRED_CHART_COLUMNS.filter((column) => !header.includes(column));
  if (missing.length > 0) {
    throw new ValidationError(`missing required columns: ${missing.join(", ")}`, { missing });
  }

  return records.map((record, index) => {
    const result = ChartShotSchema.safeParse(record);
    if (!result.success) {
      const issue = result.error.issues[0];
      // +2: header line, 1-based numbering
      throw new ValidationError(`row ${index + 2}: ${issue.path.join(".")} ${issue.message}`, {
        row: index + 2,
      });
    }
    return result.data;
  });
}

export async function readShotTable(path: string): Promise<ChartShot[]> {
  return parseShotTable(await readFile(path, "utf-8"));
}
