import type { JsonObject } from './Json.js';
import type { Link } from './Link.js';

export interface Genre {
  readonly id: string;
  readonly value: string;
}

export interface Mood {
  readonly id: string;
  readonly value: string;
}

export interface AudioSource {
  readonly url: string;
  readonly source: string; // soundcloud, mixcloud...
}

export interface BroadcastMedia {
  readonly backgroundLarge: string | null;
  readonly backgroundMediumLarge: string | null;
  readonly backgroundMedium: string | null;
  readonly backgroundSmall: string | null;
  readonly backgroundThumb: string | null;
  readonly pictureLarge: string | null;
  readonly pictureMediumLarge: string | null;
  readonly pictureMedium: string | null;
  readonly pictureSmall: string | null;
  readonly pictureThumb: string | null;
}

/**
 * Metadatos del episodio que vienen en `embeds.details`
 */
export interface Details {
  readonly status: string | null;
  readonly updated: string | null;
  readonly name: string | null;
  readonly description: string | null;
  readonly descriptionHtml: string | null;
  readonly externalLinks: readonly string[];
  readonly moods: readonly Mood[];
  readonly genres: readonly Genre[];
  readonly locationShort: string | null;
  readonly locationLong: string | null;
  readonly intensity: string | null;
  readonly media: BroadcastMedia;
  readonly episodeAlias: string | null;
  readonly showAlias: string | null;
  readonly broadcast: string | null;
  readonly mixcloud: string | null;
  readonly audioSources: readonly AudioSource[];
  readonly brand: JsonObject | null;
  readonly embeds: JsonObject | null;
  readonly links: readonly Link[];
}

/**
 * Programa que está sonando (o va a sonar) en un canal
 */
export interface Broadcast {
  readonly channel: string;
  readonly title: string;
  readonly startTime: string; // ISO 8601
  readonly endTime: string; // ISO 8601
  readonly details: Details;
  readonly links: readonly Link[];

  // Copias planas de los campos más usados de `details`
  readonly name: string | null;
  readonly description: string | null;
  readonly locationShort: string | null;
  readonly locationLong: string | null;
  readonly showAlias: string | null;
  readonly episodeAlias: string | null;
  readonly pictureUrl: string | null;

  // JSON original, para campos que todavía no modelamos
  readonly raw: JsonObject;
}
