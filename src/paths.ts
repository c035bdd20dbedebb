import { join } from "node:path";
import { STATE_DIR_NAME } from "./constants.js";

export interface FleetdeckPaths {
  root: string;
  stateDir: string;
  eventsLog: string;
  commandHistoryPath: string;
  inboundSocket: string;
  outboundSocket: string;
  graphDir: string;
}

export const getFleetdeckPaths = ({ root }: { root: string }): FleetdeckPaths => {
  const stateDir = join(root, STATE_DIR_NAME);
  return {
    root,
    stateDir,
    eventsLog: join(stateDir, "events.log"),
    commandHistoryPath: join(stateDir, "command-history.json"),
    inboundSocket: join(stateDir, "console.sock"),
    outboundSocket: join(stateDir, "dispatch.sock"),
    graphDir: join(root, "maps"),
  };
};
