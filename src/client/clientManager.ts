import type { Logger } from "@src/infrastructure/logger.js";
import {
  PeerEndpoint,
  type PeerEndpointOptions,
  type RoomDirectory,
} from "@src/domains/peer/peerEndpoint.js";
import { socketTransport, type PeerSocket } from "@src/domains/peer/socketTransport.js";

/**
 * Connected clients, keyed by socket id. Each client owns one PeerEndpoint.
 */
export class ClientManager {
  private readonly clients = new Map<string, PeerEndpoint>();

  constructor(
    private readonly rooms: RoomDirectory,
    private readonly logger: Logger,
    private readonly endpointOptions?: PeerEndpointOptions,
  ) {}

  addClient(socket: PeerSocket): PeerEndpoint {
    const existing = this.clients.get(socket.id);
    if (existing) return existing;

    const endpoint = new PeerEndpoint(
      socketTransport(socket),
      this.rooms,
      this.logger,
      this.endpointOptions,
    );
    this.clients.set(socket.id, endpoint);
    return endpoint;
  }

  getClient(socketId: string): PeerEndpoint | undefined {
    return this.clients.get(socketId);
  }

  /** Close the client's endpoint (ending its room session) and forget it */
  removeClient(socketId: string, reason: string): boolean {
    const endpoint = this.clients.get(socketId);
    if (!endpoint) return false;

    endpoint.close(reason);
    this.clients.delete(socketId);
    return true;
  }

  getClientCount(): number {
    return this.clients.size;
  }

  /** Close every endpoint (graceful shutdown) */
  closeAll(reason: string): void {
    for (const socketId of [...this.clients.keys()]) {
      this.removeClient(socketId, reason);
    }
  }
}
