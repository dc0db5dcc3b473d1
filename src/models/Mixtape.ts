import type { JsonObject } from './Json.js';
import type { Link } from './Link.js';

export interface MixtapeMedia {
  readonly animationLargeLandscape: string | null;
  readonly animationLargePortrait: string | null;
  readonly animationThumb: string | null;
  readonly iconBlack: string | null;
  readonly iconWhite: string | null;
  readonly pictureLarge: string | null;
  readonly pictureMediumLarge: string | null;
  readonly pictureMedium: string | null;
  readonly pictureSmall: string | null;
  readonly pictureThumb: string | null;
}

export interface MixtapeCredit {
  readonly name: string;
  readonly path: string;
}

export interface Mixtape {
  readonly mixtapeAlias: string;
  readonly title: string;
  readonly subtitle: string;
  readonly description: string;
  readonly descriptionHtml: string;
  readonly audioStreamEndpoint: string;
  readonly credits: readonly MixtapeCredit[];
  readonly media: MixtapeMedia;
  readonly nowPlayingTopic: string | null;
  readonly links: readonly Link[];
  readonly raw: JsonObject;
}

export interface ResultSetMetadata {
  readonly count: number | null;
  readonly offset: number | null;
  readonly limit: number | null;
}

/**
 * Respuesta completa del endpoint de mixtapes.
 * `results` conserva el orden del payload; `byAlias` sirve para buscar por alias
 * y también itera en orden de aparición.
 */
export interface MixtapeList {
  readonly metadata: ResultSetMetadata | null;
  readonly results: readonly Mixtape[];
  readonly links: readonly Link[];
  readonly byAlias: ReadonlyMap<string, Mixtape>;
}
