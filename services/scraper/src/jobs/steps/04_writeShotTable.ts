import type { Shot } from "@shotmaps/shared";
import type { ILogger } from "../../lib/logger";
import { writeShotTable } from "../../table/shotTable";

export async function stepWriteShotTable({
  path,
  shots,
  logger,
}: {
  path: string;
  shots: readonly Shot[];
  logger: ILogger;
}): Promise<void> {
  await writeShotTable(path, shots);
  logger.info(`saved ${shots.length} rows to ${path}`, { path, rowCount: shots.length });
}
