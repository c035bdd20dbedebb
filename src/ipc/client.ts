import { randomUUID } from "node:crypto";
import { stat } from "node:fs/promises";
import { createConnection } from "node:net";
import { IPC_DOWN_CACHE_MS, IPC_TIMEOUT_MS } from "../constants.js";
import {
  IPC_VERSION,
  makeIpcResponse,
  parseIpcResponse,
  splitLines,
  type IpcRequest,
  type IpcResponse,
} from "./protocol.js";

export interface IpcClientSocket {
  on(event: "data", listener: (chunk: Buffer) => void): void;
  on(event: "error", listener: (error: Error) => void): void;
  on(event: "connect", listener: () => void): void;
  write: (data: string) => void;
  end: () => void;
  destroy: () => void;
}

export type IpcConnect = (path: string) => IpcClientSocket;

export interface IpcClient {
  request: ({
    type,
    payload,
    id,
  }: {
    type: string;
    payload?: unknown;
    id?: string;
  }) => Promise<IpcResponse>;
}

/**
 * Sends one request per connection to a newline-delimited JSON socket.
 *
 * After a connection failure the socket is treated as down for `downCacheMs`
 * and requests fail fast instead of reconnecting.
 */
export const createIpcClient = ({
  socketPath,
  timeoutMs = IPC_TIMEOUT_MS,
  downCacheMs = IPC_DOWN_CACHE_MS,
  connect = createConnection,
  checkSocket = async (path: string) => {
    await stat(path);
  },
  now = () => Date.now(),
}: {
  socketPath: string;
  timeoutMs?: number;
  downCacheMs?: number;
  connect?: IpcConnect;
  checkSocket?: (path: string) => Promise<void>;
  now?: () => number;
}): IpcClient => {
  let retryAt = 0;

  const markDown = (): void => {
    retryAt = now() + downCacheMs;
  };

  return {
    request: async ({ type, payload, id }) => {
      if (now() < retryAt) {
        throw new Error("ipc socket unavailable");
      }
      try {
        await checkSocket(socketPath);
      } catch {
        markDown();
        throw new Error(`ipc socket missing: ${socketPath}`);
      }
      const requestId = id ?? randomUUID();
      const message: IpcRequest = { v: IPC_VERSION, id: requestId, type, payload };

      return new Promise<IpcResponse>((resolve, reject) => {
        const socket = connect(socketPath);
        let buffer = "";
        let settled = false;
        const timer = setTimeout(() => {
          if (settled) {
            return;
          }
          settled = true;
          socket.destroy();
          markDown();
          reject(new Error(`ipc timeout (${timeoutMs}ms)`));
        }, timeoutMs);

        const finalize = (response: IpcResponse): void => {
          if (settled) {
            return;
          }
          settled = true;
          clearTimeout(timer);
          socket.end();
          resolve(response);
        };

        socket.on("error", (error) => {
          if (settled) {
            return;
          }
          settled = true;
          clearTimeout(timer);
          markDown();
          reject(error);
        });

        socket.on("connect", () => {
          socket.write(`${JSON.stringify(message)}\n`);
        });

        socket.on("data", (chunk) => {
          const { lines, rest } = splitLines({ buffer: buffer + chunk.toString() });
          buffer = rest;
          for (const line of lines) {
            let response: IpcResponse;
            try {
              response = parseIpcResponse({ line });
            } catch (error) {
              finalize(
                makeIpcResponse({
                  id: requestId,
                  ok: false,
                  error: error instanceof Error ? error.message : String(error),
                }),
              );
              return;
            }
            if (response.id && response.id !== requestId) {
              continue;
            }
            finalize(response);
            return;
          }
        });
      });
    },
  };
};
