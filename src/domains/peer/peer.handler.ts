import type { AppContext } from "@src/context.js";
import { logger } from "@src/infrastructure/logger.js";
import { joinRoomSchema, mediaEventSchema } from "@src/socket/schemas.js";
import { createHandler, createSimpleHandler } from "@src/shared/handler.utils.js";
import { Errors } from "@src/shared/errors.js";
import type { PeerSocket } from "./socketTransport.js";

const handleJoin = createHandler("room:join", joinRoomSchema, async (payload, socket, context) => {
  const endpoint = context.clientManager.getClient(socket.id);
  if (!endpoint) {
    return { success: false, error: Errors.NOT_CONNECTED };
  }

  const result = await endpoint.join(payload.target);
  if (!result.success) {
    return { success: false, error: result.error };
  }
  return { success: true, data: { roomId: result.roomId, peerId: result.peerId } };
});

const handleLeave = createSimpleHandler("room:leave", async (socket, context) => {
  const endpoint = context.clientManager.getClient(socket.id);
  if (!endpoint?.leave()) {
    return { success: false, error: Errors.NOT_IN_ROOM };
  }
  return { success: true };
});

const handleMediaEvent = createHandler(
  "mediaEvent",
  mediaEventSchema,
  async (payload, socket, context) => {
    const endpoint = context.clientManager.getClient(socket.id);
    if (!endpoint?.handleClientEvent(payload.data)) {
      return { success: false, error: Errors.NOT_IN_ROOM };
    }
    return { success: true };
  },
);

export const peerHandler = (socket: PeerSocket, context: AppContext) => {
  socket.on("room:join", handleJoin(socket, context));
  socket.on("room:leave", handleLeave(socket, context));
  socket.on("mediaEvent", handleMediaEvent(socket, context));

  // Ending the endpoint ends its session; the room sees it through its monitor
  socket.on("disconnect", (reason: string) => {
    logger.info({ socketId: socket.id, reason }, "Socket disconnected");
    context.clientManager.removeClient(socket.id, "disconnected");
  });
};
