import { z } from "zod";

/**
 * Unified content model
 *
 * Network-agnostic message payloads. Each variant only carries the fields it
 * needs; channel senders translate them into their own wire format.
 */

export const MEDIA_TYPES = ["image", "video", "audio", "document"] as const;

export type MediaType = (typeof MEDIA_TYPES)[number];

export const textContentSchema = z.object({
  type: z.literal("text"),
  text: z.string(),
});

export const mediaContentSchema = z.object({
  type: z.literal("media"),
  mediaType: z.enum(MEDIA_TYPES).default("image"),
  url: z.string().min(1),
  caption: z.string().optional(),
  filename: z.string().optional(),
  mimeType: z.string().optional(),
  // Spoken text of an audio clip, when the producer knows it
  transcript: z.string().optional(),
});

export const stickerContentSchema = z.object({
  type: z.literal("sticker"),
  ref: z.string().min(1),
});

export const contactContentSchema = z.object({
  type: z.literal("contact"),
  name: z.string().min(1),
  phone: z.string().min(1),
  org: z.string().optional(),
});

export const locationContentSchema = z.object({
  type: z.literal("location"),
  latitude: z.number().min(-90).max(90),
  longitude: z.number().min(-180).max(180),
  name: z.string().optional(),
});

export const contentSchema = z.discriminatedUnion("type", [
  textContentSchema,
  mediaContentSchema,
  stickerContentSchema,
  contactContentSchema,
  locationContentSchema,
]);

export type TextContent = z.infer<typeof textContentSchema>;
export type MediaContent = z.infer<typeof mediaContentSchema>;
export type StickerContent = z.infer<typeof stickerContentSchema>;
export type ContactContent = z.infer<typeof contactContentSchema>;
export type LocationContent = z.infer<typeof locationContentSchema>;
export type Content = z.infer<typeof contentSchema>;

export function textContent(text: string): TextContent {
  return { type: "text", text };
}

export function mediaContent(fields: Omit<MediaContent, "type">): MediaContent {
  return { type: "media", ...fields };
}

/**
 * Short human-readable form used in logs.
 */
export function describeContent(content: Content): string {
  switch (content.type) {
    case "text":
      return content.text.length > 80 ? `${content.text.slice(0, 80)}...` : content.text;
    case "media":
      return `[${content.mediaType}] ${content.filename ?? content.url}`;
    case "sticker":
      return `[sticker] ${content.ref}`;
    case "contact":
      return `[contact] ${content.name} ${content.phone}`;
    case "location":
      return `[location] ${content.latitude},${content.longitude}`;
  }
}
