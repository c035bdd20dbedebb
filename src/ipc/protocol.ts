export const IPC_VERSION = 1 as const;

export type InboundMessageType = "fleet_state" | "task_summary" | "door_state" | "dispenser_state";

export type ConsoleControlType = "command" | "view";

export type OutboundMessageType = "delivery_request" | "loop_request" | "mode_request";

export interface IpcRequest {
  v: typeof IPC_VERSION;
  id?: string;
  type: string;
  payload?: unknown;
}

export interface IpcResponse {
  v: typeof IPC_VERSION;
  id?: string;
  ok: boolean;
  data?: unknown;
  error?: string;
}

export const makeIpcResponse = ({
  id,
  ok,
  data,
  error,
}: {
  id?: string;
  ok: boolean;
  data?: unknown;
  error?: string;
}): IpcResponse => ({
  v: IPC_VERSION,
  id,
  ok,
  data,
  error,
});

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === "object" && value !== null && !Array.isArray(value);

export const parseIpcRequest = ({ line }: { line: string }): IpcRequest => {
  const parsed: unknown = JSON.parse(line);
  if (!isRecord(parsed) || parsed.v !== IPC_VERSION || typeof parsed.type !== "string") {
    throw new Error("invalid ipc request");
  }
  return {
    v: IPC_VERSION,
    type: parsed.type,
    ...(typeof parsed.id === "string" ? { id: parsed.id } : {}),
    ...(parsed.payload !== undefined ? { payload: parsed.payload } : {}),
  };
};

export const parseIpcResponse = ({ line }: { line: string }): IpcResponse => {
  const parsed: unknown = JSON.parse(line);
  if (!isRecord(parsed) || typeof parsed.ok !== "boolean") {
    throw new Error("invalid ipc response");
  }
  return makeIpcResponse({
    id: typeof parsed.id === "string" ? parsed.id : undefined,
    ok: parsed.ok,
    data: parsed.data,
    error: typeof parsed.error === "string" ? parsed.error : undefined,
  });
};

/** Splits a socket buffer into complete lines; the trailing partial line is returned as `rest`. */
export const splitLines = ({ buffer }: { buffer: string }): { lines: string[]; rest: string } => {
  const parts = buffer.split("\n");
  const rest = parts.pop() ?? "";
  return { lines: parts.filter((line) => line.trim().length > 0), rest };
};
