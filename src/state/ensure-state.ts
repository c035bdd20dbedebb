import { mkdir, stat, writeFile } from "node:fs/promises";
import type { FleetdeckPaths } from "../paths.js";

export const ensureStateDirs = async ({ paths }: { paths: FleetdeckPaths }): Promise<void> => {
  await mkdir(paths.stateDir, { recursive: true });
  try {
    await stat(paths.eventsLog);
  } catch {
    await writeFile(paths.eventsLog, "", "utf-8");
  }
};
