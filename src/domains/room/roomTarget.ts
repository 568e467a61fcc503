import type { RoomId } from "./room.types.js";

const MAX_ROOM_ID_LENGTH = 128;

export type RoomTargetResult =
  | { success: true; roomId: RoomId }
  | { success: false; error: string };

/**
 * Extract the room id from a join target of the form `<prefix><room-id>`.
 * The room id is everything after the prefix.
 */
export function parseRoomTarget(target: string, prefix: string): RoomTargetResult {
  if (!target.startsWith(prefix)) {
    return { success: false, error: `Room target must start with "${prefix}"` };
  }

  const roomId = target.slice(prefix.length);
  if (roomId.length === 0) {
    return { success: false, error: "Room id is empty" };
  }
  if (roomId.length > MAX_ROOM_ID_LENGTH) {
    return { success: false, error: "Room id is too long" };
  }
  if (/\s/.test(roomId)) {
    return { success: false, error: "Room id must not contain whitespace" };
  }

  return { success: true, roomId };
}
