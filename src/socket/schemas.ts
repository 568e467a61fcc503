import { z } from "zod";

// ─────────────────────────────────────────────────────────────────
// Room Schemas
// ─────────────────────────────────────────────────────────────────

/**
 * room:join — the target is parsed by the peer endpoint (prefix + room id)
 */
export const joinRoomSchema = z.object({
  target: z.string().min(1),
});

// ─────────────────────────────────────────────────────────────────
// Media Schemas
// ─────────────────────────────────────────────────────────────────

/**
 * mediaEvent — `data` is opaque here and relayed to the engine as-is
 */
export const mediaEventSchema = z.object({
  data: z.unknown().refine((value) => value !== undefined, {
    message: "data is required",
  }),
});
