/**
 * =============================================================================
 * OPENROUTESERVICE ROUTING - Unit Tests
 * =============================================================================
 */

import { ErrorCode } from '../core/constants';
import { AppError } from '../core/errors/AppError';
import { OpenRouteService } from '../modules/routing/openroute.service';
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
  apiKey: 'test-secret',
  baseUrl: 'https://routing.test',
  requestTimeoutMs: 1000,
};

const ORIGIN = { latitude: 40.758, longitude: -73.9855 };
const DESTINATION = { latitude: 40.7812, longitude: -73.9665 };

function directions(coordinates: number[][]): unknown {
  return {
    type: 'FeatureCollection',
    features: [
      {
        type: 'Feature',
        geometry: { type: 'LineString', coordinates },
        properties: { summary: { distance: 3120.4, duration: 540.2 } },
      },
    ],
  };
}

async function captureError(promise: Promise<unknown>): Promise<AppError> {
  try {
    await promise;
  } catch (error) {
    if (error instanceof AppError) return error;
    throw error;
  }
  throw new Error('Expected promise to reject');
}

describe('OpenRouteService', () => {
  let cache: CacheService;
  let routing: OpenRouteService;
  let fetchSpy: jest.SpiedFunction<typeof fetch>;

  beforeEach(() => {
    cache = new CacheService(new InMemoryCache());
    routing = new OpenRouteService(OPTIONS, cache);
    fetchSpy = jest.spyOn(global, 'fetch');
  });

  afterEach(async () => {
    fetchSpy.mockRestore();
    await cache.close();
  });

  it('returns the route polyline in [longitude, latitude] order', async () => {
    fetchSpy.mockImplementation(async () => jsonResponse(directions([
      [-73.9855, 40.758, 12.5],
      [-73.975, 40.77, 14],
      [-73.9665, 40.7812, 20],
    ])));

    await expect(routing.route(ORIGIN, DESTINATION)).resolves.toEqual([
      [-73.9855, 40.758],
      [-73.975, 40.77],
      [-73.9665, 40.7812],
    ]);
  });

  it('posts both endpoints with the API key', async () => {
    fetchSpy.mockImplementation(async () => jsonResponse(directions([[0, 0], [1, 1]])));

    await routing.route(ORIGIN, DESTINATION);

    const [url, init] = fetchSpy.mock.calls[0];
    expect(String(url)).toBe('https://routing.test/v2/directions/driving-car/geojson');
    expect(init).toMatchObject({
      method: 'POST',
      headers: { Authorization: 'test-secret' },
    });
    expect(JSON.parse(String(init?.body))).toEqual({
      coordinates: [[-73.9855, 40.758], [-73.9665, 40.7812]],
    });
  });

  it('serves repeat routes from cache', async () => {
    fetchSpy.mockImplementation(async () => jsonResponse(directions([[0, 0], [1, 1]])));

    await routing.route(ORIGIN, DESTINATION);
    const second = await routing.route(ORIGIN, DESTINATION);

    expect(second).toEqual([[0, 0], [1, 1]]);
    expect(fetchSpy).toHaveBeenCalledTimes(1);
  });

  it('refuses to call out without an API key', async () => {
    routing = new OpenRouteService({ ...OPTIONS, apiKey: '' }, cache);

    const error = await captureError(routing.route(ORIGIN, DESTINATION));

    expect(routing.isAvailable()).toBe(false);
    expect(error.code).toBe(ErrorCode.ROUTING_FAILED);
    expect(fetchSpy).not.toHaveBeenCalled();
  });

  it('maps HTTP 404 to route unavailable', async () => {
    fetchSpy.mockImplementation(async () => jsonResponse({ error: 'Not found' }, 404));

    const error = await captureError(routing.route(ORIGIN, DESTINATION));

    expect(error.code).toBe(ErrorCode.ROUTE_UNAVAILABLE);
    expect(error.message).toBe('Not found');
  });

  it('maps "route not found" provider codes to route unavailable', async () => {
    fetchSpy.mockImplementation(async () => jsonResponse(
      { error: { code: 2010, message: 'Could not find routable point within a radius of 350.0 meters' } },
      400
    ));

    const error = await captureError(routing.route(ORIGIN, DESTINATION));

    expect(error.code).toBe(ErrorCode.ROUTE_UNAVAILABLE);
    expect(error.message).toBe('Could not find routable point within a radius of 350.0 meters');
    expect(error.details).toEqual({ status: 400, providerCode: 2010 });
  });

  it('maps other provider errors to a routing failure', async () => {
    fetchSpy.mockImplementation(async () => jsonResponse({ error: { code: 2003, message: 'Parameter value exceeds' } }, 400));

    const error = await captureError(routing.route(ORIGIN, DESTINATION));

    expect(error.code).toBe(ErrorCode.ROUTING_FAILED);
    expect(error.message).toBe('Routing failed with HTTP 400');
  });

  it('maps server errors to a routing failure', async () => {
    fetchSpy.mockImplementation(async () => jsonResponse({}, 500));

    const error = await captureError(routing.route(ORIGIN, DESTINATION));

    expect(error.code).toBe(ErrorCode.ROUTING_FAILED);
    expect(error.statusCode).toBe(503);
  });

  it('treats an empty feature list as route unavailable', async () => {
    fetchSpy.mockImplementation(async () => jsonResponse({ type: 'FeatureCollection', features: [] }));

    const error = await captureError(routing.route(ORIGIN, DESTINATION));

    expect(error.code).toBe(ErrorCode.ROUTE_UNAVAILABLE);
    expect(error.details).toEqual({ points: 0 });
  });

  it('treats a single-point geometry as route unavailable', async () => {
    fetchSpy.mockImplementation(async () => jsonResponse(directions([[0, 0]])));

    const error = await captureError(routing.route(ORIGIN, DESTINATION));

    expect(error.code).toBe(ErrorCode.ROUTE_UNAVAILABLE);
    expect(error.details).toEqual({ points: 1 });
  });

  it('rejects malformed payloads', async () => {
    fetchSpy.mockImplementation(async () => jsonResponse({ routes: [] }));

    const error = await captureError(routing.route(ORIGIN, DESTINATION));

    expect(error.code).toBe(ErrorCode.ROUTING_FAILED);
    expect(error.message).toBe('Unexpected routing response');
  });
});
