import { fail, succeed, type ConsoleResult } from "../result.js";
import type { GraphInfo, GraphSource, Waypoint } from "./nav-graph.js";

export interface GraphCache {
  getGraph: ({ fleetName }: { fleetName: string }) => Promise<ConsoleResult<GraphInfo>>;
  peekGraph: ({ fleetName }: { fleetName: string }) => GraphInfo | undefined;
  knownFleets: () => string[];
}

export const findWaypoint = ({
  graph,
  name,
}: {
  graph: GraphInfo;
  name: string;
}): Waypoint | undefined => graph.waypoints.find((waypoint) => waypoint.name === name);

const copyGraph = (graph: GraphInfo): GraphInfo => ({
  fleetName: graph.fleetName,
  waypoints: graph.waypoints.map((waypoint) => ({ ...waypoint })),
});

/**
 * Per-fleet navigation graphs, loaded on first use and kept for the session.
 *
 * A failed load is not remembered, so the next lookup tries again. Callers that
 * ask for a fleet while its load is in flight share that load.
 */
export const createGraphCache = ({
  source,
  onLoadError,
}: {
  source: GraphSource;
  onLoadError?: ({ fleetName, error }: { fleetName: string; error: unknown }) => void;
}): GraphCache => {
  const graphs = new Map<string, GraphInfo>();
  const inFlight = new Map<string, Promise<GraphInfo | null>>();

  const load = async (fleetName: string): Promise<GraphInfo | null> => {
    try {
      return await source.load({ fleetName });
    } catch (error) {
      onLoadError?.({ fleetName, error });
      return null;
    }
  };

  const loadOnce = (fleetName: string): Promise<GraphInfo | null> => {
    const pending = inFlight.get(fleetName);
    if (pending) {
      return pending;
    }
    const started = load(fleetName).then((graph) => {
      inFlight.delete(fleetName);
      if (graph && !graphs.has(fleetName)) {
        graphs.set(fleetName, copyGraph(graph));
      }
      return graphs.get(fleetName) ?? null;
    });
    inFlight.set(fleetName, started);
    return started;
  };

  return {
    getGraph: async ({ fleetName }) => {
      const cached = graphs.get(fleetName);
      if (cached) {
        return succeed(copyGraph(cached));
      }
      const graph = await loadOnce(fleetName);
      if (!graph) {
        return fail({ kind: "NotFound", message: `no navigation graph for fleet ${fleetName}` });
      }
      return succeed(copyGraph(graph));
    },
    peekGraph: ({ fleetName }) => {
      const cached = graphs.get(fleetName);
      return cached ? copyGraph(cached) : undefined;
    },
    knownFleets: () => [...graphs.keys()].sort(),
  };
};
