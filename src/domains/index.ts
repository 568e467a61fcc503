/**
 * Domain Registry - Static registration for zero runtime overhead
 *
 * To add a domain: Import and add to domains array
 * To remove a domain: Remove import and entry from array
 */
import type { AppContext } from "@src/context.js";
import type { PeerSocket } from "./peer/socketTransport.js";

// Domain registration function type
export type DomainRegistration = (socket: PeerSocket, ctx: AppContext) => void;

// Import domain handlers
import { peerHandler } from "./peer/peer.handler.js";

/**
 * All registered domains - order may matter for initialization
 */
export const domains: readonly DomainRegistration[] = [peerHandler];

/**
 * Register all domain handlers for a socket connection
 */
export function registerAllDomains(socket: PeerSocket, ctx: AppContext): void {
  for (const register of domains) {
    register(socket, ctx);
  }
}
