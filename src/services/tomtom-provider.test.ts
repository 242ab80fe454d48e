import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import pino from 'pino';
import { ProviderError } from '../errors.js';
import { BERLIN, PARIS } from '../testing/fake-provider.js';
import { TomTomProvider } from './tomtom-provider.js';

const logger = pino({ level: 'silent' });

const jsonResponse = (body: unknown, status = 200) =>
  new Response(JSON.stringify(body), {
    status,
    headers: { 'Content-Type': 'application/json' },
  });

describe('TomTomProvider', () => {
  const fetchMock = vi.fn<typeof fetch>();
  let provider: TomTomProvider;

  const requestedUrl = () => {
    const input = fetchMock.mock.calls[0]?.[0];
    return typeof input === 'string' ? new URL(input) : null;
  };

  beforeEach(() => {
    fetchMock.mockReset();
    vi.stubGlobal('fetch', fetchMock);
    provider = new TomTomProvider({ apiKey: 'test-key', logger });
  });

  afterEach(() => {
    vi.unstubAllGlobals();
  });

  it('does not allow caching', () => {
    expect(provider.name).toBe('TomTom');
    expect(provider.allowsCaching).toBe(false);
    expect(provider.cacheTtlMs).toBeNull();
  });

  it('requires an API key', () => {
    expect(() => new TomTomProvider({ apiKey: '', logger })).toThrow(
      'TomTom API is not configured. Please set TOMTOM_API_KEY.'
    );
  });

  describe('geocode', () => {
    it('maps the best match', async () => {
      fetchMock.mockResolvedValue(
        jsonResponse({
          results: [
            {
              score: 87.5,
              address: {
                freeformAddress: 'Pariser Platz, 10117 Berlin',
                municipality: 'Berlin',
                countrySubdivision: 'Berlin',
                postalCode: '10117',
                countryCode: 'DE',
              },
              position: { lat: 52.5163, lon: 13.3777 },
            },
          ],
        })
      );

      const result = await provider.geocode('Brandenburger Tor');

      expect(result).toEqual({
        address: 'Brandenburger Tor',
        coordinates: { lat: 52.5163, lng: 13.3777 },
        confidence: 0.875,
        formattedAddress: 'Pariser Platz, 10117 Berlin',
        countryCode: 'DE',
        postalCode: '10117',
        city: 'Berlin',
        state: 'Berlin',
        providerName: 'TomTom',
        responseTime: expect.any(String),
      });

      const url = requestedUrl();
      expect(url?.origin).toBe('https://api.tomtom.com');
      expect(url?.pathname).toBe('/search/2/geocode/Brandenburger%20Tor.json');
      expect(url?.searchParams.get('key')).toBe('test-key');
      expect(url?.searchParams.get('limit')).toBe('1');
    });

    it('caps confidence at 1', async () => {
      fetchMock.mockResolvedValue(
        jsonResponse({
          results: [
            {
              score: 140,
              address: { freeformAddress: 'Berlin' },
              position: { lat: 52.52, lon: 13.405 },
            },
          ],
        })
      );

      const result = await provider.geocode('Berlin');

      expect(result.confidence).toBe(1);
      expect(result.countryCode).toBe('');
    });

    it('returns an empty result when nothing matches', async () => {
      fetchMock.mockResolvedValue(jsonResponse({ results: [] }));

      const result = await provider.geocode('Atlantis');

      expect(result).toMatchObject({
        address: 'Atlantis',
        coordinates: null,
        formattedAddress: '',
        providerName: 'TomTom',
      });
    });

    it('throws a ProviderError on a non-2xx status', async () => {
      fetchMock.mockResolvedValue(new Response('Forbidden', { status: 403 }));

      const failure = provider.geocode('Berlin');

      await expect(failure).rejects.toBeInstanceOf(ProviderError);
      await expect(failure).rejects.toMatchObject({
        message: 'TomTom geocode failed: 403 - Forbidden',
        status: 403,
      });
    });

    it('throws a ProviderError on an unexpected body', async () => {
      fetchMock.mockResolvedValue(jsonResponse({ summary: {} }));

      await expect(provider.geocode('Berlin')).rejects.toThrow(
        /^TomTom geocode failed: unexpected response shape/
      );
    });

    it('rethrows the cancellation reason when the caller aborts', async () => {
      const controller = new AbortController();
      controller.abort();
      fetchMock.mockRejectedValue(new Error('The operation was aborted'));

      await expect(provider.geocode('Berlin', controller.signal)).rejects.toBe(
        controller.signal.reason
      );
    });
  });

  describe('reverseGeocode', () => {
    it('maps the first address', async () => {
      fetchMock.mockResolvedValue(
        jsonResponse({
          addresses: [
            {
              address: {
                freeformAddress: 'Unter den Linden 1, 10117 Berlin',
                municipality: 'Berlin',
                postalCode: '10117',
                countryCode: 'DE',
              },
              position: '52.520000,13.405000',
            },
          ],
        })
      );

      const result = await provider.reverseGeocode(BERLIN);

      expect(result).toMatchObject({
        address: 'Unter den Linden 1, 10117 Berlin',
        coordinates: BERLIN,
        confidence: 1,
        formattedAddress: 'Unter den Linden 1, 10117 Berlin',
        city: 'Berlin',
        state: '',
        providerName: 'TomTom',
      });
      expect(requestedUrl()?.pathname).toBe('/search/2/reverseGeocode/52.52,13.405.json');
    });

    it('returns an empty result when no address is known', async () => {
      fetchMock.mockResolvedValue(jsonResponse({ addresses: [] }));

      const result = await provider.reverseGeocode(BERLIN);

      expect(result.formattedAddress).toBe('');
      expect(result.coordinates).toEqual(BERLIN);
    });
  });

  describe('route', () => {
    it('maps the summary and flattens leg points', async () => {
      fetchMock.mockResolvedValue(
        jsonResponse({
          routes: [
            {
              summary: { lengthInMeters: 1_054_321, travelTimeInSeconds: 37_800 },
              legs: [
                {
                  points: [
                    { latitude: 52.52, longitude: 13.405 },
                    { latitude: 48.8566, longitude: 2.3522 },
                  ],
                },
              ],
            },
          ],
        })
      );

      const result = await provider.route(BERLIN, PARIS);

      expect(result).toEqual({
        origin: BERLIN,
        destination: PARIS,
        distanceMeters: 1_054_321,
        durationSeconds: 37_800,
        routePoints: [BERLIN, PARIS],
        instructions: '',
        providerName: 'TomTom',
        responseTime: expect.any(String),
      });

      const url = requestedUrl();
      expect(url?.pathname).toBe('/routing/1/calculateRoute/52.52,13.405:48.8566,2.3522/json');
      expect(url?.searchParams.get('routeType')).toBe('fastest');
    });

    it('returns a zero-distance route when none is found', async () => {
      fetchMock.mockResolvedValue(jsonResponse({ routes: [] }));

      const result = await provider.route(BERLIN, PARIS);

      expect(result.distanceMeters).toBe(0);
      expect(result.providerName).toBe('TomTom');
    });
  });

  describe('isHealthy', () => {
    it('is true when the probe geocode succeeds', async () => {
      fetchMock.mockResolvedValue(jsonResponse({ results: [] }));

      expect(await provider.isHealthy()).toBe(true);
      expect(requestedUrl()?.pathname).toBe('/search/2/geocode/London.json');
    });

    it('is false when the probe fails', async () => {
      fetchMock.mockRejectedValue(new TypeError('fetch failed'));

      expect(await provider.isHealthy()).toBe(false);
    });
  });
});
