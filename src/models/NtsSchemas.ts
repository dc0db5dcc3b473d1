import { z } from 'zod';
import type { JsonObject, JsonValue } from './Json.js';

/**
 * Esquemas de los payloads de la API de NTS (nombres en snake_case, tal cual llegan).
 * Los campos opcionales aceptan tanto la clave ausente como `null`.
 */

const literalSchema = z.union([z.string(), z.number(), z.boolean(), z.null()]);

export const jsonValueSchema: z.ZodType<JsonValue> = z.lazy(() =>
  z.union([literalSchema, z.array(jsonValueSchema), z.record(jsonValueSchema)])
);

// z.record descarta una clave `__proto__`; es la única que no vuelve en `raw`
export const jsonObjectSchema: z.ZodType<JsonObject> = z.record(jsonValueSchema);

const optionalText = z.string().nullish();

export const linkSchema = z.object({
  rel: z.string(),
  href: z.string(),
  type: z.string(),
});

export const genreSchema = z.object({
  id: z.string(),
  value: z.string(),
});

export const moodSchema = z.object({
  id: z.string(),
  value: z.string(),
});

export const audioSourceSchema = z.object({
  url: z.string(),
  source: z.string(),
});

export const broadcastMediaSchema = z.object({
  background_large: optionalText,
  background_medium_large: optionalText,
  background_medium: optionalText,
  background_small: optionalText,
  background_thumb: optionalText,
  picture_large: optionalText,
  picture_medium_large: optionalText,
  picture_medium: optionalText,
  picture_small: optionalText,
  picture_thumb: optionalText,
});

export const detailsSchema = z.object({
  status: optionalText,
  updated: optionalText,
  name: optionalText,
  description: optionalText,
  description_html: optionalText,
  external_links: z.array(z.string()).nullish(),
  moods: z.array(moodSchema).nullish(),
  genres: z.array(genreSchema).nullish(),
  location_short: optionalText,
  location_long: optionalText,
  intensity: optionalText,
  media: broadcastMediaSchema.nullish(),
  episode_alias: optionalText,
  show_alias: optionalText,
  broadcast: optionalText,
  mixcloud: optionalText,
  audio_sources: z.array(audioSourceSchema).nullish(),
  brand: jsonObjectSchema.nullish(),
  embeds: jsonObjectSchema.nullish(),
  links: z.array(linkSchema).nullish(),
});

export const broadcastSchema = z.object({
  broadcast_title: z.string(),
  start_timestamp: z.string(),
  end_timestamp: z.string(),
  embeds: z
    .object({
      details: detailsSchema.nullish(),
    })
    .nullish(),
  links: z.array(linkSchema).nullish(),
});

// Solo valida el sobre; cada canal se valida por separado para conservar su JSON
export const liveResponseSchema = z.object({
  results: z.array(jsonObjectSchema),
});

export const mixtapeMediaSchema = z.object({
  animation_large_landscape: optionalText,
  animation_large_portrait: optionalText,
  animation_thumb: optionalText,
  icon_black: optionalText,
  icon_white: optionalText,
  picture_large: optionalText,
  picture_medium_large: optionalText,
  picture_medium: optionalText,
  picture_small: optionalText,
  picture_thumb: optionalText,
});

export const mixtapeCreditSchema = z.object({
  name: z.string(),
  path: z.string(),
});

export const mixtapeSchema = z.object({
  mixtape_alias: z.string(),
  title: z.string(),
  subtitle: z.string(),
  description: z.string(),
  description_html: z.string(),
  audio_stream_endpoint: z.string(),
  credits: z.array(mixtapeCreditSchema).nullish(),
  media: mixtapeMediaSchema.nullish(),
  now_playing_topic: optionalText,
  links: z.array(linkSchema).nullish(),
});

export const resultSetSchema = z.object({
  count: z.number().nullish(),
  offset: z.number().nullish(),
  limit: z.number().nullish(),
});

export const mixtapesResponseSchema = z.object({
  metadata: z
    .object({
      resultset: resultSetSchema.nullish(),
    })
    .nullish(),
  results: z.array(jsonObjectSchema),
  links: z.array(linkSchema).nullish(),
});

export type NtsLink = z.infer<typeof linkSchema>;
export type NtsBroadcastMedia = z.infer<typeof broadcastMediaSchema>;
export type NtsDetails = z.infer<typeof detailsSchema>;
export type NtsBroadcast = z.infer<typeof broadcastSchema>;
export type NtsMixtapeMedia = z.infer<typeof mixtapeMediaSchema>;
export type NtsMixtape = z.infer<typeof mixtapeSchema>;
export type NtsMixtapesResponse = z.infer<typeof mixtapesResponseSchema>;
