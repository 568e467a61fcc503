import type { Socket } from "socket.io";

/**
 * Outbound half of a client connection, as seen by a PeerEndpoint
 */
export interface PeerTransport {
  readonly id: string;
  send(event: string, data: unknown): void;
}

/** The parts of a Socket.IO socket the peer domain uses */
export type PeerSocket = Pick<Socket, "id" | "emit" | "on">;

export const socketTransport = (socket: PeerSocket): PeerTransport => ({
  id: socket.id,
  send: (event, data) => {
    socket.emit(event, data);
  },
});
