import { z } from "zod";

// ─────────────────────────────────────────────────────────────────
// Client → engine media events (relay engine protocol)
// ─────────────────────────────────────────────────────────────────

const trackIdSchema = z.string().min(1).max(128);

export const clientMediaEventSchema = z.discriminatedUnion("type", [
  z.object({
    type: z.literal("join"),
    data: z.object({ metadata: z.unknown() }).default({}),
  }),
  z.object({
    type: z.literal("updatePeerMetadata"),
    data: z.object({ metadata: z.unknown() }),
  }),
  z.object({
    type: z.literal("addTracks"),
    data: z.object({ tracks: z.record(trackIdSchema, z.unknown()) }),
  }),
  z.object({
    type: z.literal("removeTracks"),
    data: z.object({ trackIds: z.array(trackIdSchema).min(1) }),
  }),
  z.object({
    type: z.literal("signal"),
    data: z.object({ to: z.string().min(1), signal: z.unknown() }),
  }),
]);

export type ClientMediaEvent = z.infer<typeof clientMediaEventSchema>;

export type MediaEventParseResult =
  | { success: true; event: ClientMediaEvent }
  | { success: false; error: string };

/**
 * Browsers may send the media event either as an object or as its JSON
 * text; both are accepted.
 */
export function parseClientMediaEvent(data: unknown): MediaEventParseResult {
  let raw: unknown = data;
  if (typeof data === "string") {
    try {
      raw = JSON.parse(data);
    } catch {
      return { success: false, error: "Malformed media event" };
    }
  }

  const result = clientMediaEventSchema.safeParse(raw);
  if (!result.success) {
    return { success: false, error: "Invalid media event" };
  }
  return { success: true, event: result.data };
}
