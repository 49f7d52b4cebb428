import { describe, it, expect, vi, beforeEach } from 'vitest';
import {
  SaavnCatalogSearch,
  SaavnCatalogOptions,
  SaavnSong,
  buildSearchText,
  decodeHtmlEntities,
  mapSearchResponse,
  mapSongToCandidate,
  parseKbps,
  selectArtworkUrl,
  selectBestStream,
} from '../../../src/main/services/saavnCatalog';
import { APIError } from '../../../src/main/services/errors';
import { Logger } from '../../../src/main/services/logger';

// ─── Mocks ───────────────────────────────────────────────────────────────────

const { mockGet } = vi.hoisted(() => ({ mockGet: vi.fn() }));

vi.mock('axios', () => ({
  default: {
    get: mockGet,
    isAxiosError: (err: unknown): boolean =>
      err instanceof Error && 'isAxiosError' in err && err.isAxiosError === true,
  },
}));

function httpError(status: number): Error {
  return Object.assign(new Error(`Request failed with status code ${status}`), {
    isAxiosError: true,
    response: { status },
  });
}

const TEST_OPTIONS: SaavnCatalogOptions = {
  apiBaseUrl: 'https://catalog.example.test/',
  limit: 5,
  maxRetries: 2,
  baseRetryDelay: 1,
  minRequestInterval: 0,
};

function createSong(overrides: Partial<SaavnSong> = {}): SaavnSong {
  return {
    id: 'song-1',
    name: 'Shape of You',
    year: '2017',
    duration: 233,
    label: 'Atlantic Records UK',
    language: 'english',
    url: 'https://catalog.example.test/song/shape-of-you/song-1',
    copyright: '(P) 2017 Test Label',
    album: { id: 'album-1', name: '&divide; (Deluxe)' },
    artists: {
      primary: [{ id: 'a1', name: 'Ed Sheeran', role: 'primary_artists' }],
      all: [
        { id: 'a1', name: 'Ed Sheeran', role: 'primary_artists' },
        { id: 'a2', name: 'Steve Mac', role: 'music' },
        { id: 'a3', name: 'Johnny McDaid', role: 'lyricist' },
      ],
    },
    image: [
      { quality: '50x50', url: 'https://img.example.test/50.jpg' },
      { quality: '150x150', url: 'https://img.example.test/150.jpg' },
      { quality: '500x500', url: 'https://img.example.test/500.jpg' },
    ],
    downloadUrl: [
      { quality: '96kbps', url: 'https://cdn.example.test/96.mp4' },
      { quality: '320kbps', url: 'https://cdn.example.test/320.mp4' },
      { quality: '160kbps', url: 'https://cdn.example.test/160.mp4' },
    ],
    ...overrides,
  };
}

// ─── Mapping ─────────────────────────────────────────────────────────────────

describe('saavnCatalog mapping', () => {
  describe('decodeHtmlEntities', () => {
    it('should decode named and numeric entities', () => {
      expect(decodeHtmlEntities('Rock &amp; Roll &quot;Live&quot; &#039;99 &#x41;')).toBe(
        'Rock & Roll "Live" \'99 A',
      );
    });

    it('should leave unknown entities untouched', () => {
      expect(decodeHtmlEntities('a &divide; b')).toBe('a &divide; b');
    });
  });

  describe('parseKbps', () => {
    it('should parse bitrate labels', () => {
      expect(parseKbps('320kbps')).toBe(320);
      expect(parseKbps('96 KBPS')).toBe(96);
      expect(parseKbps('high')).toBe(0);
      expect(parseKbps(undefined)).toBe(0);
    });
  });

  describe('selectArtworkUrl', () => {
    it('should prefer the 500x500 rendition', () => {
      expect(selectArtworkUrl(createSong().image)).toBe('https://img.example.test/500.jpg');
    });

    it('should fall back to the last image', () => {
      expect(
        selectArtworkUrl([
          { quality: '50x50', url: 'https://img.example.test/50.jpg' },
          { quality: '150x150', url: 'https://img.example.test/150.jpg' },
        ]),
      ).toBe('https://img.example.test/150.jpg');
    });

    it('should return undefined without images', () => {
      expect(selectArtworkUrl([])).toBeUndefined();
      expect(selectArtworkUrl(null)).toBeUndefined();
    });
  });

  describe('selectBestStream', () => {
    it('should pick the highest bitrate', () => {
      expect(selectBestStream(createSong().downloadUrl)).toEqual({
        url: 'https://cdn.example.test/320.mp4',
        kbps: 320,
      });
    });

    it('should skip links without a URL', () => {
      expect(selectBestStream([{ quality: '320kbps' }])).toBeUndefined();
    });
  });

  describe('mapSongToCandidate', () => {
    it('should map a full song entry', () => {
      expect(mapSongToCandidate(createSong())).toEqual({
        catalogId: 'song-1',
        title: 'Shape of You',
        artist: 'Ed Sheeran',
        album: '&divide; (Deluxe)',
        year: 2017,
        durationSeconds: 233,
        artworkUrl: 'https://img.example.test/500.jpg',
        qualityScore: 320,
        albumArtist: 'Steve Mac',
        composer: 'Johnny McDaid',
        label: 'Atlantic Records UK',
        genre: 'English',
        copyright: '(P) 2017 Test Label',
        permalink: 'https://catalog.example.test/song/shape-of-you/song-1',
        streamUrl: 'https://cdn.example.test/320.mp4',
      });
    });

    it('should capitalize the language for the genre', () => {
      expect(mapSongToCandidate(createSong({ language: 'hindi' }))?.genre).toBe('Hindi');
      expect(mapSongToCandidate(createSong({ language: null }))?.genre).toBeUndefined();
    });

    it('should decode entities in names', () => {
      const candidate = mapSongToCandidate(createSong({ name: 'Don&#039;t Stop &amp; Go' }));

      expect(candidate?.title).toBe("Don't Stop & Go");
    });

    it('should fall back to primaryArtists and use the artist as album artist', () => {
      const candidate = mapSongToCandidate(
        createSong({ artists: null, primaryArtists: 'Arijit Singh, Shreya Ghoshal' }),
      );

      expect(candidate?.artist).toBe('Arijit Singh, Shreya Ghoshal');
      expect(candidate?.albumArtist).toBe('Arijit Singh, Shreya Ghoshal');
      expect(candidate?.composer).toBeUndefined();
    });

    it('should drop non-positive years and durations', () => {
      const candidate = mapSongToCandidate(createSong({ year: '0', duration: '' }));

      expect(candidate?.year).toBeUndefined();
      expect(candidate?.durationSeconds).toBeUndefined();
    });

    it('should score a song without streams as quality 0', () => {
      const candidate = mapSongToCandidate(createSong({ downloadUrl: [] }));

      expect(candidate?.qualityScore).toBe(0);
      expect(candidate?.streamUrl).toBeUndefined();
    });

    it('should return null without an id or name', () => {
      expect(mapSongToCandidate(createSong({ id: undefined }))).toBeNull();
      expect(mapSongToCandidate(createSong({ name: '   ' }))).toBeNull();
    });
  });

  describe('mapSearchResponse', () => {
    it('should map every usable result', () => {
      const candidates = mapSearchResponse({
        success: true,
        data: { results: [createSong(), createSong({ id: undefined }), createSong({ id: 'song-2' })] },
      });

      expect(candidates.map((c) => c.catalogId)).toEqual(['song-1', 'song-2']);
    });

    it('should return an empty list for an unsuccessful response', () => {
      expect(mapSearchResponse({ success: false, data: { results: [createSong()] } })).toEqual([]);
      expect(mapSearchResponse({})).toEqual([]);
    });
  });

  describe('buildSearchText', () => {
    it('should append the first non-empty hint', () => {
      expect(buildSearchText('Closer', ['  ', 'Halsey', 'The Chainsmokers'])).toBe('Closer Halsey');
      expect(buildSearchText('Closer', [])).toBe('Closer');
    });
  });
});

// ─── SaavnCatalogSearch ──────────────────────────────────────────────────────

describe('SaavnCatalogSearch', () => {
  beforeEach(() => {
    vi.resetAllMocks();
  });

  it('should query the search endpoint and map the results', async () => {
    mockGet.mockResolvedValueOnce({
      data: { success: true, data: { results: [createSong()] } },
    });
    const catalog = new SaavnCatalogSearch(TEST_OPTIONS);

    const candidates = await catalog.search('Shape of You', ['Ed Sheeran']);

    expect(candidates).toHaveLength(1);
    expect(candidates[0].catalogId).toBe('song-1');
    expect(mockGet).toHaveBeenCalledWith(
      'https://catalog.example.test/api/search/songs',
      expect.objectContaining({
        params: { query: 'Shape of You Ed Sheeran', limit: 5 },
      }),
    );
  });

  it('should retry transient failures', async () => {
    mockGet
      .mockRejectedValueOnce(httpError(503))
      .mockRejectedValueOnce(new Error('socket hang up'))
      .mockResolvedValueOnce({ data: { success: true, data: { results: [createSong()] } } });
    const catalog = new SaavnCatalogSearch(TEST_OPTIONS);

    const candidates = await catalog.search('Shape of You', []);

    expect(candidates).toHaveLength(1);
    expect(mockGet).toHaveBeenCalledTimes(3);
  });

  it('should retry on 429', async () => {
    mockGet
      .mockRejectedValueOnce(httpError(429))
      .mockResolvedValueOnce({ data: { success: true, data: { results: [] } } });
    const catalog = new SaavnCatalogSearch(TEST_OPTIONS);

    await expect(catalog.search('Yellow', [])).resolves.toEqual([]);
    expect(mockGet).toHaveBeenCalledTimes(2);
  });

  it('should not retry a client error and return an empty list', async () => {
    mockGet.mockRejectedValueOnce(httpError(404));
    const logger = new Logger({ writeToFile: false });
    const logPipelineError = vi.spyOn(logger, 'logPipelineError');
    const catalog = new SaavnCatalogSearch({ ...TEST_OPTIONS, logger });

    const candidates = await catalog.search('Yellow', []);

    expect(candidates).toEqual([]);
    expect(mockGet).toHaveBeenCalledTimes(1);
    expect(logPipelineError).toHaveBeenCalledTimes(1);
    expect(logPipelineError.mock.calls[0][0].category).toBe('APIError');
    expect(logPipelineError.mock.calls[0][1]).toBe('WARN');
  });

  it('should return an empty list once retries are exhausted', async () => {
    mockGet.mockRejectedValue(httpError(500));
    const catalog = new SaavnCatalogSearch(TEST_OPTIONS);

    const candidates = await catalog.search('Yellow', []);

    expect(candidates).toEqual([]);
    expect(mockGet).toHaveBeenCalledTimes(3);
  });

  it('should throw APIError from querySearch when retries are exhausted', async () => {
    mockGet.mockRejectedValue(httpError(502));
    const catalog = new SaavnCatalogSearch({ ...TEST_OPTIONS, maxRetries: 0 });

    const error = await catalog.querySearch('Yellow').catch((e: unknown) => e);

    expect(error).toBeInstanceOf(APIError);
    expect(error).toMatchObject({
      message: 'JioSaavn search failed after 1 attempts for "Yellow"',
      service: 'JioSaavn',
    });
  });

  it('should report the status code of a client error', async () => {
    mockGet.mockRejectedValueOnce(httpError(400));
    const catalog = new SaavnCatalogSearch(TEST_OPTIONS);

    await expect(catalog.querySearch('Yellow')).rejects.toMatchObject({ statusCode: 400 });
  });
});
