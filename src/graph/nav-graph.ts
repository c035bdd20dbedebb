import { readFile } from "node:fs/promises";
import { isAbsolute, join } from "node:path";
import { parse } from "yaml";

export interface Waypoint {
  name: string;
  hasWorkcell: boolean;
  dispenser?: string;
  ingestor?: string;
}

export interface GraphInfo {
  fleetName: string;
  waypoints: Waypoint[];
}

export interface GraphSource {
  /** Resolves null when the fleet has no graph or its graph is malformed. */
  load: ({ fleetName }: { fleetName: string }) => Promise<GraphInfo | null>;
}

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === "object" && value !== null && !Array.isArray(value);

const readOptionalName = (value: unknown): string | undefined =>
  typeof value === "string" && value.trim().length > 0 ? value.trim() : undefined;

const parseVertex = ({ vertex }: { vertex: unknown }): Waypoint | null => {
  if (!Array.isArray(vertex)) {
    return null;
  }
  const properties: unknown = vertex[2];
  if (!isRecord(properties)) {
    return null;
  }
  const name = readOptionalName(properties.name);
  if (!name) {
    return null;
  }
  const dispenser = readOptionalName(properties.pickup_dispenser);
  const ingestor = readOptionalName(properties.dropoff_ingestor);
  return {
    name,
    hasWorkcell: Boolean(dispenser || ingestor),
    ...(dispenser ? { dispenser } : {}),
    ...(ingestor ? { ingestor } : {}),
  };
};

/**
 * Reads the named waypoints out of a navigation graph document.
 *
 * Waypoints come back in level order, then vertex order. Unnamed vertices are
 * skipped and a repeated name keeps its first vertex.
 */
export const parseNavGraph = ({
  fleetName,
  raw,
}: {
  fleetName: string;
  raw: string;
}): GraphInfo | null => {
  let document: unknown;
  try {
    document = parse(raw);
  } catch {
    return null;
  }
  if (!isRecord(document) || !isRecord(document.levels)) {
    return null;
  }
  const seen = new Set<string>();
  const waypoints: Waypoint[] = [];
  for (const level of Object.values(document.levels)) {
    if (!isRecord(level) || !Array.isArray(level.vertices)) {
      continue;
    }
    for (const vertex of level.vertices) {
      const waypoint = parseVertex({ vertex });
      if (!waypoint || seen.has(waypoint.name)) {
        continue;
      }
      seen.add(waypoint.name);
      waypoints.push(waypoint);
    }
  }
  return { fleetName, waypoints };
};

export const resolveGraphPath = ({
  fleetName,
  graphDir,
  graphFiles,
}: {
  fleetName: string;
  graphDir: string;
  graphFiles: Record<string, string>;
}): string => {
  const explicit = graphFiles[fleetName];
  if (explicit) {
    return isAbsolute(explicit) ? explicit : join(graphDir, explicit);
  }
  return join(graphDir, `${fleetName}.yaml`);
};

export const createFileGraphSource = ({
  graphDir,
  graphFiles = {},
}: {
  graphDir: string;
  graphFiles?: Record<string, string>;
}): GraphSource => ({
  load: async ({ fleetName }) => {
    const path = resolveGraphPath({ fleetName, graphDir, graphFiles });
    let raw: string;
    try {
      raw = await readFile(path, "utf-8");
    } catch (error) {
      const err = error as NodeJS.ErrnoException;
      if (err?.code === "ENOENT" || err?.code === "EISDIR") {
        return null;
      }
      throw error;
    }
    return parseNavGraph({ fleetName, raw });
  },
});
