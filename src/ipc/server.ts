import { createServer } from "node:net";
import { mkdir, rm } from "node:fs/promises";
import { dirname } from "node:path";
import {
  makeIpcResponse,
  parseIpcRequest,
  splitLines,
  type IpcRequest,
  type IpcResponse,
} from "./protocol.js";

export interface IpcHandlerContext {
  requestId?: string;
}

export type IpcHandler = ({
  payload,
  context,
}: {
  payload: unknown;
  context: IpcHandlerContext;
}) => Promise<unknown>;

export type IpcHandlers = Record<string, IpcHandler>;

export interface IpcServerHandle {
  close: () => Promise<void>;
}

export interface IpcServerSocket {
  on(event: "data", listener: (chunk: Buffer) => void): void;
  on(event: "close", listener: () => void): void;
  write: (data: string) => void;
  destroy: () => void;
}

export interface IpcNetServer {
  listen: (path: string, cb?: () => void) => void;
  on: (event: "error", listener: (error: Error) => void) => void;
  close: (cb?: () => void) => void;
}

export interface IpcNetAdapter {
  createServer: (onConnection: (socket: IpcServerSocket) => void) => IpcNetServer;
}

const defaultNet: IpcNetAdapter = { createServer };

const sendResponse = ({
  socket,
  response,
}: {
  socket: IpcServerSocket;
  response: IpcResponse;
}): void => {
  socket.write(`${JSON.stringify(response)}\n`);
};

const describeError = (error: unknown): string =>
  error instanceof Error ? error.message : String(error);

const handleLine = ({
  line,
  socket,
  handlers,
  onHandlerError,
}: {
  line: string;
  socket: IpcServerSocket;
  handlers: IpcHandlers;
  onHandlerError?: ({ request, error }: { request: IpcRequest; error: unknown }) => void;
}): void => {
  let request: IpcRequest;
  try {
    request = parseIpcRequest({ line });
  } catch (error) {
    sendResponse({ socket, response: makeIpcResponse({ ok: false, error: describeError(error) }) });
    return;
  }
  const handler = handlers[request.type];
  if (!handler) {
    sendResponse({
      socket,
      response: makeIpcResponse({
        id: request.id,
        ok: false,
        error: `unknown ipc type: ${request.type}`,
      }),
    });
    return;
  }
  void handler({ payload: request.payload, context: { requestId: request.id } })
    .then((data) => {
      sendResponse({ socket, response: makeIpcResponse({ id: request.id, ok: true, data }) });
    })
    .catch((error: unknown) => {
      onHandlerError?.({ request, error });
      sendResponse({
        socket,
        response: makeIpcResponse({ id: request.id, ok: false, error: describeError(error) }),
      });
    });
};

/**
 * Serves newline-delimited JSON requests on a Unix socket. Each request is
 * answered on the same connection, matched by id.
 */
export const startIpcServer = async ({
  socketPath,
  handlers,
  onError,
  onHandlerError,
  net = defaultNet,
}: {
  socketPath: string;
  handlers: IpcHandlers;
  onError?: (error: Error) => void;
  onHandlerError?: ({ request, error }: { request: IpcRequest; error: unknown }) => void;
  net?: IpcNetAdapter;
}): Promise<IpcServerHandle> => {
  await mkdir(dirname(socketPath), { recursive: true });
  await rm(socketPath, { force: true });

  const sockets = new Set<IpcServerSocket>();
  const server = net.createServer((socket) => {
    sockets.add(socket);
    let buffer = "";
    socket.on("close", () => {
      sockets.delete(socket);
    });
    socket.on("data", (chunk) => {
      const { lines, rest } = splitLines({ buffer: buffer + chunk.toString() });
      buffer = rest;
      for (const line of lines) {
        handleLine({ line, socket, handlers, onHandlerError });
      }
    });
  });

  await new Promise<void>((resolve, reject) => {
    server.on("error", reject);
    server.listen(socketPath, () => resolve());
  });
  server.on("error", (error) => {
    onError?.(error);
  });

  return {
    close: async () => {
      for (const socket of sockets) {
        socket.destroy();
      }
      await new Promise<void>((resolve) => {
        server.close(() => resolve());
      });
      await rm(socketPath, { force: true });
    },
  };
};
