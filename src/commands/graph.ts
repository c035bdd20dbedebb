import { loadConfig } from "../config.js";
import { createFileGraphSource, type GraphInfo } from "../graph/nav-graph.js";
import { getWorkspaceRoot } from "../workspace-root.js";

export const formatGraphListing = ({ graph }: { graph: GraphInfo }): string[] => [
  `${graph.fleetName}: ${graph.waypoints.length} waypoints`,
  ...graph.waypoints.map((waypoint) => {
    const extras = [
      waypoint.dispenser ? `dispenser=${waypoint.dispenser}` : null,
      waypoint.ingestor ? `ingestor=${waypoint.ingestor}` : null,
    ].filter((value): value is string => value !== null);
    const workcell = waypoint.hasWorkcell ? " [workcell]" : "";
    return `  ${waypoint.name}${workcell}${extras.length > 0 ? ` ${extras.join(" ")}` : ""}`;
  }),
];

export const runGraph = async ({ args }: { args: string[] }): Promise<void> => {
  const [fleetName] = args;
  if (!fleetName) {
    throw new Error("Usage: fleetdeck graph <fleet>");
  }
  const root = getWorkspaceRoot();
  const config = await loadConfig({ root });
  const source = createFileGraphSource({ graphDir: config.graphDir, graphFiles: config.graphFiles });
  const graph = await source.load({ fleetName });
  if (!graph) {
    throw new Error(`No navigation graph for fleet ${fleetName}`);
  }
  for (const line of formatGraphListing({ graph })) {
    process.stdout.write(`${line}\n`);
  }
};
