import { z } from 'zod';
import { decode } from 'html-entities';
import type {
  AudioSource,
  Broadcast,
  BroadcastMedia,
  Details,
  Genre,
  Mood,
} from '../models/Broadcast.js';
import type { JsonObject } from '../models/Json.js';
import type { Link } from '../models/Link.js';
import type {
  Mixtape,
  MixtapeCredit,
  MixtapeList,
  MixtapeMedia,
  ResultSetMetadata,
} from '../models/Mixtape.js';
import {
  broadcastSchema,
  detailsSchema,
  jsonObjectSchema,
  liveResponseSchema,
  mixtapeSchema,
  mixtapesResponseSchema,
  type NtsBroadcastMedia,
  type NtsDetails,
  type NtsLink,
  type NtsMixtapeMedia,
} from '../models/NtsSchemas.js';
import { ErrorNts } from '../utils/ErrorHandler.js';

/** Qué programa de cada canal se extrae del endpoint `live`. */
export type BroadcastSlot = 'now' | 'next';

const resultsEnvelopeSchema = z.object({ results: z.array(z.unknown()) });

/**
 * Validar `value` contra `schema` o lanzar ErrorNts con la ruta del campo problemático
 */
function parsear<T extends z.ZodTypeAny>(schema: T, value: unknown, contexto: string): z.infer<T> {
  const resultado = schema.safeParse(value);
  if (!resultado.success) {
    const problemas = resultado.error.issues
      .map(issue => `${issue.path.length > 0 ? issue.path.join('.') : '(raíz)'}: ${issue.message}`)
      .join('; ');
    throw new ErrorNts(`${contexto} inválido: ${problemas}`, 'FORMATO_INVALIDO', resultado.error);
  }
  return resultado.data;
}

function opcional(valor: string | null | undefined): string | null {
  return valor ?? null;
}

// Decodifica entidades HTML (&amp; -> &) en textos pensados para leer
function texto(valor: string): string {
  return decode(valor);
}

function textoOpcional(valor: string | null | undefined): string | null {
  return valor === null || valor === undefined ? null : decode(valor);
}

export function mapLink(link: NtsLink): Link {
  return {
    rel: link.rel,
    href: link.href,
    type: link.type,
  };
}

function mapLinks(links: readonly NtsLink[] | null | undefined): Link[] {
  return (links ?? []).map(mapLink);
}

function mapBroadcastMedia(media: NtsBroadcastMedia | null | undefined): BroadcastMedia {
  return {
    backgroundLarge: opcional(media?.background_large),
    backgroundMediumLarge: opcional(media?.background_medium_large),
    backgroundMedium: opcional(media?.background_medium),
    backgroundSmall: opcional(media?.background_small),
    backgroundThumb: opcional(media?.background_thumb),
    pictureLarge: opcional(media?.picture_large),
    pictureMediumLarge: opcional(media?.picture_medium_large),
    pictureMedium: opcional(media?.picture_medium),
    pictureSmall: opcional(media?.picture_small),
    pictureThumb: opcional(media?.picture_thumb),
  };
}

function convertDetails(details: NtsDetails | null | undefined): Details {
  const genres: Genre[] = (details?.genres ?? []).map(genre => ({
    id: genre.id,
    value: texto(genre.value),
  }));

  const moods: Mood[] = (details?.moods ?? []).map(mood => ({
    id: mood.id,
    value: texto(mood.value),
  }));

  const audioSources: AudioSource[] = (details?.audio_sources ?? []).map(source => ({
    url: source.url,
    source: source.source,
  }));

  return {
    status: opcional(details?.status),
    updated: opcional(details?.updated),
    name: textoOpcional(details?.name),
    description: textoOpcional(details?.description),
    descriptionHtml: opcional(details?.description_html),
    externalLinks: [...(details?.external_links ?? [])],
    moods,
    genres,
    locationShort: opcional(details?.location_short),
    locationLong: opcional(details?.location_long),
    intensity: opcional(details?.intensity),
    media: mapBroadcastMedia(details?.media),
    episodeAlias: opcional(details?.episode_alias),
    showAlias: opcional(details?.show_alias),
    broadcast: opcional(details?.broadcast),
    mixcloud: opcional(details?.mixcloud),
    audioSources,
    brand: details?.brand ?? null,
    embeds: details?.embeds ?? null,
    links: mapLinks(details?.links),
  };
}

/**
 * Mapear el objeto `embeds.details` de un episodio
 */
export function mapDetails(payload: unknown): Details {
  return convertDetails(parsear(detailsSchema, payload, 'Detalle de episodio'));
}

/**
 * Mapear un programa (el objeto `now` o `next` de un canal) a Broadcast
 */
export function mapBroadcast(channel: string, payload: unknown): Broadcast {
  // La copia validada como JSON es la que queda en `raw`; el input no se toca
  const raw = parsear(jsonObjectSchema, payload, `Programa del canal ${channel}`);
  const data = parsear(broadcastSchema, raw, `Programa del canal ${channel}`);
  const details = convertDetails(data.embeds?.details);

  return {
    channel,
    title: texto(data.broadcast_title),
    startTime: data.start_timestamp,
    endTime: data.end_timestamp,
    details,
    links: mapLinks(data.links),
    name: details.name,
    description: details.description,
    locationShort: details.locationShort,
    locationLong: details.locationLong,
    showAlias: details.showAlias,
    episodeAlias: details.episodeAlias,
    pictureUrl: details.media.pictureLarge,
    raw,
  };
}

/**
 * Mapear la respuesta del endpoint `live`: un Broadcast por canal que tenga el programa pedido.
 * El identificador del canal es su `channel_name`, o su posición (desde 1) si no lo trae.
 */
export function mapLiveResponse(payload: unknown, slot: BroadcastSlot = 'now'): Broadcast[] {
  if (!resultsEnvelopeSchema.safeParse(payload).success) {
    throw new ErrorNts('Formato de datos en vivo inválido', 'FORMATO_INVALIDO');
  }

  const { results } = parsear(liveResponseSchema, payload, 'Respuesta en vivo');
  const broadcasts: Broadcast[] = [];

  results.forEach((channel, index) => {
    const programa = channel[slot];
    if (programa === undefined || programa === null) {
      return;
    }

    const channelName = channel['channel_name'];
    const id = typeof channelName === 'string' ? channelName : String(index + 1);
    broadcasts.push(mapBroadcast(id, programa));
  });

  return broadcasts;
}

function mapMixtapeMedia(media: NtsMixtapeMedia | null | undefined): MixtapeMedia {
  return {
    animationLargeLandscape: opcional(media?.animation_large_landscape),
    animationLargePortrait: opcional(media?.animation_large_portrait),
    animationThumb: opcional(media?.animation_thumb),
    iconBlack: opcional(media?.icon_black),
    iconWhite: opcional(media?.icon_white),
    pictureLarge: opcional(media?.picture_large),
    pictureMediumLarge: opcional(media?.picture_medium_large),
    pictureMedium: opcional(media?.picture_medium),
    pictureSmall: opcional(media?.picture_small),
    pictureThumb: opcional(media?.picture_thumb),
  };
}

/**
 * Mapear una mixtape individual
 */
export function mapMixtape(payload: unknown): Mixtape {
  const raw: JsonObject = parsear(jsonObjectSchema, payload, 'Mixtape');
  const data = parsear(mixtapeSchema, raw, 'Mixtape');

  const credits: MixtapeCredit[] = (data.credits ?? []).map(credit => ({
    name: texto(credit.name),
    path: credit.path,
  }));

  return {
    mixtapeAlias: data.mixtape_alias,
    title: texto(data.title),
    subtitle: texto(data.subtitle),
    description: texto(data.description),
    descriptionHtml: data.description_html,
    audioStreamEndpoint: data.audio_stream_endpoint,
    credits,
    media: mapMixtapeMedia(data.media),
    nowPlayingTopic: opcional(data.now_playing_topic),
    links: mapLinks(data.links),
    raw,
  };
}

/**
 * Mapear la respuesta del endpoint `mixtapes`
 */
export function mapMixtapesResponse(payload: unknown): MixtapeList {
  if (!resultsEnvelopeSchema.safeParse(payload).success) {
    throw new ErrorNts('Formato de datos de mixtapes inválido', 'FORMATO_INVALIDO');
  }

  const data = parsear(mixtapesResponseSchema, payload, 'Respuesta de mixtapes');
  const results = data.results.map(mapMixtape);

  // Un alias repetido conserva la posición del primero y el registro del último
  const byAlias = new Map<string, Mixtape>();
  for (const mixtape of results) {
    byAlias.set(mixtape.mixtapeAlias, mixtape);
  }

  const resultset = data.metadata?.resultset;
  const metadata: ResultSetMetadata | null = resultset
    ? {
        count: resultset.count ?? null,
        offset: resultset.offset ?? null,
        limit: resultset.limit ?? null,
      }
    : null;

  return {
    metadata,
    results,
    links: mapLinks(data.links),
    byAlias,
  };
}
