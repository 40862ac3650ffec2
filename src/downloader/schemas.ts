import { z } from "zod";

/**
 * One entry of yt-dlp's `formats` array.
 * Only the fields the organizer reads are declared; the rest pass through.
 */
export const rawFormatSchema = z.looseObject({
  format_id: z.string().nullish(),
  ext: z.string().nullish(),
  vcodec: z.string().nullish(),
  acodec: z.string().nullish(),
  height: z.number().nullish(),
  fps: z.number().nullish(),
  abr: z.number().nullish(),
  filesize: z.number().nullish(),
  format_note: z.string().nullish(),
});

export type RawFormat = z.infer<typeof rawFormatSchema>;

/**
 * The single-video JSON printed by `yt-dlp --dump-single-json`.
 */
export const rawVideoInfoSchema = z.looseObject({
  title: z.string().nullish(),
  duration: z.number().nullish(),
  thumbnail: z.string().nullish(),
  uploader: z.string().nullish(),
  view_count: z.number().nullish(),
  upload_date: z.string().nullish(),
  description: z.string().nullish(),
  formats: z.array(rawFormatSchema).nullish(),
});

export type RawVideoInfo = z.infer<typeof rawVideoInfoSchema>;

/**
 * Parses the engine's metadata JSON.
 * Throws when the text isn't JSON or doesn't have the expected shape.
 */
export function parseRawVideoInfo(json: string): RawVideoInfo {
  const result = rawVideoInfoSchema.safeParse(JSON.parse(json));
  if (!result.success) {
    const issue = result.error.issues[0];
    const where = issue ? `${issue.path.join(".")}: ${issue.message}` : "unknown shape";
    throw new Error(`Unexpected metadata from yt-dlp (${where})`);
  }
  return result.data;
}
