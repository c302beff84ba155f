/**
 * =============================================================================
 * NOMINATIM GEOCODING - Unit Tests
 * =============================================================================
 *
 * fetch is stubbed; no request leaves the process.
 * =============================================================================
 */

import { ErrorCode } from '../core/constants';
import { AppError } from '../core/errors/AppError';
import { NominatimGeocodingService } from '../modules/geocoding/nominatim.service';
import { CacheService, InMemoryCache } from '../shared/services/cache.service';
import { jsonResponse } from './helpers/lookup-stubs';

jest.mock('../shared/services/logger.service', () => ({
  logger: {
    info: jest.fn(),
    warn: jest.fn(),
    error: jest.fn(),
    debug: jest.fn(),
  },
}));

const OPTIONS = {
  baseUrl: 'https://geocoder.test',
  userAgent: 'sunseat-test',
  requestTimeoutMs: 1000,
};

async function captureError(promise: Promise<unknown>): Promise<AppError> {
  try {
    await promise;
  } catch (error) {
    if (error instanceof AppError) return error;
    throw error;
  }
  throw new Error('Expected promise to reject');
}

describe('NominatimGeocodingService', () => {
  let cache: CacheService;
  let geocoder: NominatimGeocodingService;
  let fetchSpy: jest.SpiedFunction<typeof fetch>;

  beforeEach(() => {
    cache = new CacheService(new InMemoryCache());
    geocoder = new NominatimGeocodingService(OPTIONS, cache);
    fetchSpy = jest.spyOn(global, 'fetch');
  });

  afterEach(async () => {
    fetchSpy.mockRestore();
    await cache.close();
  });

  it('resolves the best match to a coordinate', async () => {
    fetchSpy.mockImplementation(async () => jsonResponse([
      { lat: '40.7580', lon: '-73.9855', display_name: 'Times Square, Manhattan' },
      { lat: '1', lon: '1', display_name: 'Elsewhere' },
    ]));

    await expect(geocoder.resolve('Times Square')).resolves.toEqual({
      latitude: 40.758,
      longitude: -73.9855,
    });
  });

  it('queries the search endpoint with an identifying User-Agent', async () => {
    fetchSpy.mockImplementation(async () => jsonResponse([{ lat: '10', lon: '20' }]));

    await geocoder.resolve('  Central Park ');

    expect(fetchSpy).toHaveBeenCalledTimes(1);
    const [url, init] = fetchSpy.mock.calls[0];
    expect(String(url)).toBe('https://geocoder.test/search?q=Central+Park&format=json&limit=1');
    expect(init).toMatchObject({
      method: 'GET',
      headers: { 'User-Agent': 'sunseat-test' },
    });
  });

  it('serves repeat lookups from cache regardless of case', async () => {
    fetchSpy.mockImplementation(async () => jsonResponse([{ lat: '10', lon: '20' }]));

    await geocoder.resolve('Central Park');
    const second = await geocoder.resolve('central park');

    expect(second).toEqual({ latitude: 10, longitude: 20 });
    expect(fetchSpy).toHaveBeenCalledTimes(1);
  });

  it('reports an empty result as location not found', async () => {
    fetchSpy.mockImplementation(async () => jsonResponse([]));

    const error = await captureError(geocoder.resolve('Atlantis'));

    expect(error.code).toBe(ErrorCode.LOCATION_NOT_FOUND);
    expect(error.message).toBe('Could not find location: Atlantis');
  });

  it('does not cache misses', async () => {
    fetchSpy.mockImplementation(async () => jsonResponse([]));

    await captureError(geocoder.resolve('Atlantis'));
    await captureError(geocoder.resolve('Atlantis'));

    expect(fetchSpy).toHaveBeenCalledTimes(2);
  });

  it('rejects a blank place name without a request', async () => {
    const error = await captureError(geocoder.resolve('   '));

    expect(error.code).toBe(ErrorCode.INVALID_INPUT);
    expect(fetchSpy).not.toHaveBeenCalled();
  });

  it('maps HTTP errors to a geocoding failure', async () => {
    fetchSpy.mockImplementation(async () => jsonResponse({ error: 'busy' }, 503));

    const error = await captureError(geocoder.resolve('Central Park'));

    expect(error.code).toBe(ErrorCode.GEOCODING_FAILED);
    expect(error.statusCode).toBe(503);
    expect(error.details).toEqual({ status: 503 });
  });

  it('maps network failures to a geocoding failure', async () => {
    fetchSpy.mockRejectedValue(new TypeError('fetch failed'));

    const error = await captureError(geocoder.resolve('Central Park'));

    expect(error.code).toBe(ErrorCode.GEOCODING_FAILED);
    expect(error.message).toBe('Nominatim geocoder is unreachable');
  });

  it('rejects payloads with out-of-range coordinates', async () => {
    fetchSpy.mockImplementation(async () => jsonResponse([{ lat: '123', lon: '20' }]));

    const error = await captureError(geocoder.resolve('Central Park'));

    expect(error.code).toBe(ErrorCode.GEOCODING_FAILED);
    expect(error.message).toBe('Unexpected geocoding response');
  });

  it('rejects non-JSON bodies', async () => {
    fetchSpy.mockImplementation(async () => new Response('<html>oops</html>', { status: 200 }));

    const error = await captureError(geocoder.resolve('Central Park'));

    expect(error.code).toBe(ErrorCode.GEOCODING_FAILED);
    expect(error.message).toBe('Nominatim geocoder returned an unreadable response');
  });
});
