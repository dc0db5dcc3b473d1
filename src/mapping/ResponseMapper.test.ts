import { describe, expect, it } from 'vitest';
import { loadFixture } from '../__fixtures__/index.js';
import { ErrorNts } from '../utils/ErrorHandler.js';
import {
  mapBroadcast,
  mapDetails,
  mapLiveResponse,
  mapMixtape,
  mapMixtapesResponse,
} from './ResponseMapper.js';

const minimalBroadcast = (title: string) => ({
  broadcast_title: title,
  start_timestamp: '2026-03-04T10:00:00Z',
  end_timestamp: '2026-03-04T12:00:00Z',
});

const minimalMixtape = (alias: string, title: string) => ({
  mixtape_alias: alias,
  title,
  subtitle: 'Subtitle',
  description: 'Description',
  description_html: '<p>Description</p>',
  audio_stream_endpoint: `https://stream.example.com/${alias}`,
});

describe('mapLiveResponse', () => {
  const live = loadFixture('live.json');

  it('produces one broadcast per channel with the current show', () => {
    const broadcasts = mapLiveResponse(live);

    expect(broadcasts).toHaveLength(2);
    expect(broadcasts.map(b => b.channel)).toEqual(['1', '2']);
    expect(broadcasts[0].startTime).toBe('2026-03-04T10:00:00Z');
    expect(broadcasts[0].endTime).toBe('2026-03-04T12:00:00Z');
  });

  it('decodes HTML entities in titles, names and descriptions', () => {
    const [first, second] = mapLiveResponse(live);

    expect(first.title).toBe('CALM ROOTS W/ ALEX RITA & FRIENDS');
    expect(first.name).toBe('Calm Roots w/ Alex Rita & Friends');
    expect(first.description).toBe('A slow morning of ambient jazz & field recordings.');
    expect(second.title).toBe('SIGNAL & NOISE');
  });

  it('leaves the HTML description untouched', () => {
    const [first] = mapLiveResponse(live);

    expect(first.details.descriptionHtml).toBe(
      '<p>A slow morning of ambient jazz &amp; field recordings.</p>'
    );
  });

  it('maps the nested details of the episode', () => {
    const [first] = mapLiveResponse(live);
    const details = first.details;

    expect(details.locationLong).toBe('London');
    expect(details.locationShort).toBe('LDN');
    expect(details.genres.map(genre => genre.value)).toEqual(['Ambient Jazz', 'Ambient']);
    expect(details.moods).toEqual([{ id: 'mood-1', value: 'Late Night' }]);
    expect(details.externalLinks).toEqual(['https://example.com/calm-roots']);
    expect(details.audioSources).toEqual([
      { url: 'https://soundcloud.com/example/calm-roots', source: 'soundcloud' },
    ]);
    expect(details.intensity).toBe('25');
    expect(details.brand).toEqual({});
    expect(details.links).toHaveLength(1);
    expect(details.links[0].rel).toBe('self');
  });

  it('copies the most used details onto the broadcast', () => {
    const [first] = mapLiveResponse(live);

    expect(first.showAlias).toBe('calm-roots');
    expect(first.episodeAlias).toBe('calm-roots-4th-march-2026');
    expect(first.locationLong).toBe('London');
    expect(first.pictureUrl).toBe('https://media.example.com/calm-roots/large.jpg');
    expect(first.links).toEqual([
      {
        rel: 'details',
        href: 'https://www.nts.live/api/v2/shows/calm-roots/episodes/calm-roots-4th-march-2026',
        type: 'application/vnd.episode+json;charset=utf-8',
      },
    ]);
  });

  it('uses null for missing optional fields and keeps empty strings', () => {
    const [first, second] = mapLiveResponse(live);

    expect(first.details.mixcloud).toBeNull();
    expect(first.details.media.pictureMedium).toBeNull();
    expect(first.details.media.backgroundLarge).toBe('https://media.example.com/calm-roots/bg-large.jpg');

    expect(second.description).toBe('');
    expect(second.details.status).toBeNull();
    expect(second.details.descriptionHtml).toBeNull();
    expect(second.details.intensity).toBeNull();
    expect(second.details.brand).toBeNull();
    expect(second.pictureUrl).toBeNull();
    expect(second.details.genres).toEqual([]);
    expect(second.details.externalLinks).toEqual([]);
    expect(second.links).toEqual([]);
  });

  it('extracts the upcoming show when asked for the next slot', () => {
    const upcoming = mapLiveResponse(live, 'next');

    expect(upcoming).toHaveLength(1);
    expect(upcoming[0].channel).toBe('1');
    expect(upcoming[0].title).toBe('MORNING LOOPS');
    expect(upcoming[0].locationLong).toBe('Manchester');
  });

  it('falls back to the channel position when there is no channel name', () => {
    const broadcasts = mapLiveResponse({
      results: [{ next: minimalBroadcast('SKIPPED') }, { now: minimalBroadcast('SECOND') }],
    });

    expect(broadcasts).toHaveLength(1);
    expect(broadcasts[0].channel).toBe('2');
    expect(broadcasts[0].title).toBe('SECOND');
  });

  it('is idempotent and does not mutate its input', () => {
    const before = structuredClone(live);

    expect(mapLiveResponse(live)).toEqual(mapLiveResponse(live));
    expect(live).toEqual(before);
  });

  it('rejects a payload without results', () => {
    expect(() => mapLiveResponse({ invalid: 'format' })).toThrow(ErrorNts);
    expect(() => mapLiveResponse({ invalid: 'format' })).toThrow('Formato de datos en vivo inválido');
    expect(() => mapLiveResponse('not json')).toThrow('Formato de datos en vivo inválido');
  });
});

describe('mapBroadcast', () => {
  it('keeps the original JSON including fields that are not modelled', () => {
    const payload: Record<string, unknown> = {
      ...minimalBroadcast('RAW &amp; READY'),
      channel_extra: { nested: [1, 2, { deep: true }] },
      rating: 4.5,
    };

    const broadcast = mapBroadcast('1', payload);

    for (const key of Object.keys(payload)) {
      expect(broadcast.raw[key]).toEqual(payload[key]);
    }
    expect(broadcast.raw['broadcast_title']).toBe('RAW &amp; READY');
    expect(broadcast.raw).not.toBe(payload);
  });

  it('drops a __proto__ key from the retained JSON', () => {
    const payload: unknown = JSON.parse(
      '{"broadcast_title":"T","start_timestamp":"a","end_timestamp":"b","__proto__":{"x":1},"kept":1}'
    );

    const broadcast = mapBroadcast('1', payload);

    expect(Object.keys(broadcast.raw)).toEqual(['broadcast_title', 'start_timestamp', 'end_timestamp', 'kept']);
  });

  it('builds empty details when the payload has none', () => {
    const broadcast = mapBroadcast('1', minimalBroadcast('BARE'));

    expect(broadcast.details.name).toBeNull();
    expect(broadcast.details.media.pictureLarge).toBeNull();
    expect(broadcast.details.audioSources).toEqual([]);
    expect(broadcast.name).toBeNull();
  });

  it('fails when a mandatory field is missing', () => {
    const { broadcast_title: _omitted, ...withoutTitle } = minimalBroadcast('GONE');

    expect(() => mapBroadcast('1', withoutTitle)).toThrow(/broadcast_title/);
    try {
      mapBroadcast('1', withoutTitle);
    } catch (error) {
      expect(error).toBeInstanceOf(ErrorNts);
      expect(error).toHaveProperty('codigo', 'FORMATO_INVALIDO');
    }
  });

  it('fails when an optional field has the wrong type', () => {
    const payload = {
      ...minimalBroadcast('TYPED'),
      embeds: { details: { location_long: 42 } },
    };

    expect(() => mapBroadcast('1', payload)).toThrow(/embeds\.details\.location_long/);
  });
});

describe('mapDetails', () => {
  it('maps a details object on its own', () => {
    const details = mapDetails({
      name: 'Rock &amp; Roll',
      genres: [{ id: 'g1', value: 'Drum &amp; Bass' }],
      mixcloud: 'https://www.mixcloud.com/example/show/',
    });

    expect(details.name).toBe('Rock & Roll');
    expect(details.genres).toEqual([{ id: 'g1', value: 'Drum & Bass' }]);
    expect(details.mixcloud).toBe('https://www.mixcloud.com/example/show/');
    expect(details.locationLong).toBeNull();
  });
});

describe('mapMixtapesResponse', () => {
  const mixtapes = loadFixture('mixtapes.json');

  it('keeps the payload order and indexes mixtapes by alias', () => {
    const list = mapMixtapesResponse(mixtapes);

    expect(list.results.map(m => m.mixtapeAlias)).toEqual(['poolside', 'slow-focus']);
    expect([...list.byAlias.keys()]).toEqual(['poolside', 'slow-focus']);
    expect(list.byAlias.get('poolside')).toBe(list.results[0]);
  });

  it('maps the poolside mixtape', () => {
    const poolside = mapMixtapesResponse(mixtapes).byAlias.get('poolside');

    expect(poolside?.title).toBe('Poolside');
    expect(poolside?.subtitle).toBe('Balearic, boogie & sophisti-pop for long afternoons.');
    expect(poolside?.audioStreamEndpoint).toBe('https://stream-mixtape-geo.ntslive.net/mixtape4');
    expect(poolside?.credits).toHaveLength(7);
    expect(poolside?.credits[0]).toEqual({ name: 'Test Show One', path: '/shows/test-show-one' });
    expect(poolside?.media.iconWhite).toBe('https://media.example.com/poolside/icon-white.png');
    expect(poolside?.media.iconBlack).toBeNull();
    expect(poolside?.nowPlayingTopic).toBe('/mixtapes/poolside/now');
    expect(poolside?.links[0].href).toBe('https://www.nts.live/api/v2/mixtapes/poolside');
    expect(poolside?.raw['audio_stream_endpoint']).toBe('https://stream-mixtape-geo.ntslive.net/mixtape4');
  });

  it('uses null and empty lists for what a mixtape leaves out', () => {
    const slowFocus = mapMixtapesResponse(mixtapes).byAlias.get('slow-focus');

    expect(slowFocus?.credits).toEqual([]);
    expect(slowFocus?.links).toEqual([]);
    expect(slowFocus?.nowPlayingTopic).toBeNull();
    expect(slowFocus?.media.pictureLarge).toBeNull();
  });

  it('reads the result set metadata and top-level links', () => {
    const list = mapMixtapesResponse(mixtapes);

    expect(list.metadata).toEqual({ count: 2, offset: 0, limit: 20 });
    expect(list.links).toHaveLength(1);
    expect(list.links[0].href).toBe('https://www.nts.live/api/v2/mixtapes');
  });

  it('returns null metadata when the payload has none', () => {
    const list = mapMixtapesResponse({ results: [] });

    expect(list.metadata).toBeNull();
    expect(list.results).toEqual([]);
    expect(list.byAlias.size).toBe(0);
  });

  it('keeps the last record for a repeated alias', () => {
    const list = mapMixtapesResponse({
      results: [minimalMixtape('dup', 'First'), minimalMixtape('dup', 'Second')],
    });

    expect(list.results).toHaveLength(2);
    expect(list.byAlias.size).toBe(1);
    expect(list.byAlias.get('dup')?.title).toBe('Second');
  });

  it('is idempotent', () => {
    expect(mapMixtapesResponse(mixtapes)).toEqual(mapMixtapesResponse(mixtapes));
  });

  it('rejects a payload without results', () => {
    expect(() => mapMixtapesResponse({ invalid: 'format' })).toThrow('Formato de datos de mixtapes inválido');
  });
});

describe('mapMixtape', () => {
  it('fails when the alias is missing', () => {
    const { mixtape_alias: _omitted, ...withoutAlias } = minimalMixtape('lost', 'Lost');

    expect(() => mapMixtape(withoutAlias)).toThrow(/mixtape_alias/);
  });

  it('decodes credit names', () => {
    const mixtape = mapMixtape({
      ...minimalMixtape('credits', 'Credits'),
      credits: [{ name: 'Salt &amp; Pepper', path: '/shows/salt-and-pepper' }],
    });

    expect(mixtape.credits).toEqual([{ name: 'Salt & Pepper', path: '/shows/salt-and-pepper' }]);
  });
});
