export const IPC_TIMEOUT_MS = 2_000;
// Shorter than the dispatch interval so a retry on the next tick reconnects.
export const IPC_DOWN_CACHE_MS = 500;
export const COMMAND_HISTORY_LIMIT = 50;
export const EVENT_TAIL_LIMIT = 8;
export const CONFIG_FILE_NAME = "fleetdeck.yaml";
export const STATE_DIR_NAME = ".fleetdeck";
