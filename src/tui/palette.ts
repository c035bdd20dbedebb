export const PALETTE = {
  fg: "white",
  bg: "black",
  accent: "cyan",
  muted: "gray",
} as const;

export const TAG_COLORS = {
  FAIL: "red",
  RTRY: "yellow",
  SENT: "green",
  QUEU: "cyan",
  MODE: "magenta",
  INFO: "gray",
} as const;

export type EventTag = keyof typeof TAG_COLORS;
