import chalk from 'chalk';
import { DEFAULT_CONFIG, HELP_MESSAGES } from '../config/defaults.js';
import type { Broadcast } from '../models/Broadcast.js';
import type { Mixtape, MixtapeList } from '../models/Mixtape.js';

function encabezado(titulo: string): string[] {
  return [titulo, '-'.repeat(titulo.length)];
}

function lista(titulo: string, items: readonly string[]): string[] {
  if (items.length === 0) {
    return [];
  }
  return ['', chalk.bold(titulo), ...items.map(item => `- ${item}`)];
}

/**
 * Líneas a imprimir para un canal en vivo
 */
export function formatBroadcast(broadcast: Broadcast): string[] {
  const details = broadcast.details;
  const lines: string[] = [
    '',
    ...encabezado(`Canal ${broadcast.channel}`).map(line => chalk.cyan(line)),
    `${chalk.bold(broadcast.title)} 🔴`,
  ];

  if (details.description) {
    lines.push('', details.description);
  }

  lines.push(...lista('Géneros:', details.genres.map(genre => genre.value)));
  lines.push(...lista('Moods:', details.moods.map(mood => mood.value)));

  if (details.locationLong) {
    lines.push('', `Ubicación: ${details.locationLong}`);
  }

  lines.push(...lista('Links:', details.externalLinks));
  lines.push(...lista('Fuentes de audio:', details.audioSources.map(source => `${source.source}: ${source.url}`)));

  if (details.mixcloud) {
    lines.push('', `Mixcloud: ${details.mixcloud}`);
  }

  lines.push('', `Inicio: ${broadcast.startTime}`, `Fin: ${broadcast.endTime}`);

  if (details.media.pictureLarge) {
    lines.push('', `Arte: ${chalk.gray(details.media.pictureLarge)}`);
  }

  return lines;
}

/**
 * Líneas a imprimir para una mixtape; solo se listan los primeros créditos
 */
export function formatMixtape(mixtape: Mixtape, maxCredits: number = DEFAULT_CONFIG.MAX_CREDITS_SHOWN): string[] {
  const lines: string[] = [
    '',
    chalk.magenta(`${mixtape.title} (${mixtape.mixtapeAlias})`),
    chalk.magenta('-'.repeat(mixtape.title.length)),
    mixtape.subtitle,
    '',
    mixtape.description,
  ];

  if (mixtape.credits.length > 0) {
    lines.push(...lista('Con:', mixtape.credits.slice(0, maxCredits).map(credit => credit.name)));
    if (mixtape.credits.length > maxCredits) {
      lines.push(chalk.gray(`...y ${mixtape.credits.length - maxCredits} más`));
    }
  }

  lines.push('', `🎵 ${mixtape.audioStreamEndpoint}`);
  return lines;
}

export function formatLiveSection(broadcasts: readonly Broadcast[]): string[] {
  return [
    ...encabezado(HELP_MESSAGES.LIVE_HEADER).map(line => chalk.bold(line)),
    ...broadcasts.flatMap(broadcast => formatBroadcast(broadcast)),
  ];
}

export function formatMixtapesSection(mixtapes: MixtapeList): string[] {
  return [
    '',
    ...encabezado(HELP_MESSAGES.MIXTAPES_HEADER).map(line => chalk.bold(line)),
    ...[...mixtapes.byAlias.values()].flatMap(mixtape => formatMixtape(mixtape)),
  ];
}
