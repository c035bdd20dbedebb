import { readFile } from "node:fs/promises";
import type { FleetdeckEvent } from "./events.js";

export const parseEventLines = ({ raw }: { raw: string }): FleetdeckEvent[] =>
  raw
    .split("\n")
    .map((line) => line.trim())
    .filter((line) => line.length > 0)
    .map((line) => {
      try {
        return JSON.parse(line) as FleetdeckEvent;
      } catch {
        return null;
      }
    })
    .filter((event): event is FleetdeckEvent => event !== null);

export const readRecentEvents = async ({
  eventsLog,
  limit,
}: {
  eventsLog: string;
  limit: number;
}): Promise<FleetdeckEvent[]> => {
  let raw: string;
  try {
    raw = await readFile(eventsLog, "utf-8");
  } catch {
    return [];
  }
  return parseEventLines({ raw }).slice(-limit);
};
