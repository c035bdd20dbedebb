import type { TaskPublisher } from "../tasks/dispatcher.js";
import type { IpcClient } from "./client.js";
import type { OutboundMessageType } from "./protocol.js";

const publish = async ({
  client,
  type,
  payload,
}: {
  client: IpcClient;
  type: OutboundMessageType;
  payload: unknown;
}): Promise<void> => {
  const response = await client.request({ type, payload });
  if (!response.ok) {
    throw new Error(response.error ?? `${type} rejected`);
  }
};

/** Publishes task and mode requests to the dispatch backend socket. */
export const createIpcTaskPublisher = ({ client }: { client: IpcClient }): TaskPublisher => ({
  publishTask: ({ request }) => publish({ client, type: request.type, payload: request.message }),
  publishMode: ({ request }) => publish({ client, type: "mode_request", payload: request }),
});
