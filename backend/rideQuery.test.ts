import {
  attachRecentEvents,
  buildCountQuery,
  buildPageQuery,
  buildRecentEventsQuery,
  DEFAULT_PAGE_SIZE,
  fetchRide,
  fetchRidePage,
  parseOrdering,
  parseRideListParams,
  recentEventsThreshold,
  type RideListParams
} from './rideQuery';
import {
  InvalidCoordinatesError,
  InvalidOrderingError,
  InvalidPaginationError,
  MissingCoordinatesError,
  NotFoundError
} from './errors';
import { eventRow, hoursAgo, listResolver, MockPool, NOW, rideRow } from './testHelpers';

const options = { maxPageSize: 100 };

function params(overrides: Partial<RideListParams> = {}): RideListParams {
  return {
    ordering: [],
    page: { kind: 'number', number: 1 },
    pageSize: DEFAULT_PAGE_SIZE,
    ...overrides
  };
}

describe('parseOrdering', () => {
  it('accepts ascending and descending keys', () => {
    expect(parseOrdering('pickup_time,-distance')).toEqual([
      { field: 'pickup_time', direction: 'ASC' },
      { field: 'distance', direction: 'DESC' }
    ]);
  });

  it('ignores empty items', () => {
    expect(parseOrdering(' , -pickup_time,')).toEqual([{ field: 'pickup_time', direction: 'DESC' }]);
    expect(parseOrdering(undefined)).toEqual([]);
  });

  it('rejects unknown keys', () => {
    expect(() => parseOrdering('status')).toThrow(InvalidOrderingError);
    expect(() => parseOrdering('--distance')).toThrow(
      'Invalid ordering field "--distance". Allowed values: pickup_time, -pickup_time, distance, -distance.'
    );
  });
});

describe('parseRideListParams', () => {
  it('applies defaults', () => {
    expect(parseRideListParams({}, options)).toEqual({
      status: undefined,
      riderEmail: undefined,
      ordering: [],
      point: undefined,
      page: { kind: 'number', number: 1 },
      pageSize: 20
    });
  });

  it('reads filters and treats empty values as absent', () => {
    const parsed = parseRideListParams({ status: 'pickup', rider_email: '', rider__email: 'rider@example.com' }, options);
    expect(parsed.status).toBe('pickup');
    expect(parsed.riderEmail).toBe('rider@example.com');
    expect(parseRideListParams({ status: '' }, options).status).toBeUndefined();
  });

  it('requires both coordinates for distance ordering', () => {
    expect(() => parseRideListParams({ ordering: 'distance' }, options)).toThrow(MissingCoordinatesError);
    expect(() => parseRideListParams({ ordering: '-distance', lat: '1' }, options)).toThrow(
      MissingCoordinatesError
    );
  });

  it('rejects malformed coordinates', () => {
    expect(() => parseRideListParams({ ordering: 'distance', lat: 'abc', lng: 'xyz' }, options)).toThrow(
      InvalidCoordinatesError
    );
    expect(() => parseRideListParams({ ordering: 'distance', lat: '', lng: '1' }, options)).toThrow(
      InvalidCoordinatesError
    );
    expect(() => parseRideListParams({ ordering: 'distance', lat: 'inf', lng: '1' }, options)).toThrow(
      InvalidCoordinatesError
    );
    expect(() => parseRideListParams({ ordering: 'distance', lat: '1e999', lng: '1' }, options)).toThrow(
      InvalidCoordinatesError
    );
  });

  it('rejects malformed coordinates without distance ordering', () => {
    expect(() => parseRideListParams({ lat: 'north' }, options)).toThrow(InvalidCoordinatesError);
  });

  it('parses decimal coordinates into a point', () => {
    expect(parseRideListParams({ ordering: 'distance', lat: '-33.5', lng: '.25' }, options).point).toEqual({
      lat: -33.5,
      lng: 0.25
    });
    expect(parseRideListParams({ lat: '1' }, options).point).toBeUndefined();
  });

  it('validates pagination', () => {
    expect(parseRideListParams({ page: '3', page_size: '5' }, options)).toMatchObject({
      page: { kind: 'number', number: 3 },
      pageSize: 5
    });
    expect(parseRideListParams({ page: 'last' }, options).page).toEqual({ kind: 'last' });
    expect(parseRideListParams({ page_size: '500' }, options).pageSize).toBe(100);
    expect(() => parseRideListParams({ page: '0' }, options)).toThrow(InvalidPaginationError);
    expect(() => parseRideListParams({ page: '1.5' }, options)).toThrow(InvalidPaginationError);
    expect(() => parseRideListParams({ page_size: '-1' }, options)).toThrow('"page_size" must be a positive integer.');
  });
});

describe('SQL composition', () => {
  it('counts with the same filters as the page', () => {
    const query = buildCountQuery(params({ status: 'pickup', riderEmail: 'rider@example.com' }));
    expect(query.text).toBe(
      [
        'SELECT COUNT(*)::int AS count',
        'FROM ride r',
        'LEFT JOIN "user" rider ON rider.id_user = r.id_rider',
        'LEFT JOIN "user" driver ON driver.id_user = r.id_driver',
        'WHERE r.status = $1 AND rider.email = $2'
      ].join('\n')
    );
    expect(query.values).toEqual(['pickup', 'rider@example.com']);
  });

  it('omits the WHERE clause without filters', () => {
    expect(buildCountQuery(params()).text).not.toContain('WHERE');
    expect(buildCountQuery(params()).values).toEqual([]);
  });

  it('always tie-breaks on the ride id', () => {
    const query = buildPageQuery(params(), 20, 0);
    expect(query.text).toContain('\nORDER BY r.id_ride ASC\n');
    expect(query.text).toContain('\nLIMIT $1 OFFSET $2');
    expect(query.values).toEqual([20, 0]);
    expect(query.text).not.toContain('AS distance');
  });

  it('orders by pickup time before the tie-break', () => {
    const query = buildPageQuery(params({ ordering: [{ field: 'pickup_time', direction: 'DESC' }] }), 10, 30);
    expect(query.text).toContain('ORDER BY r.pickup_time DESC, r.id_ride ASC');
    expect(query.values).toEqual([10, 30]);
  });

  it('derives the planar squared distance from the request point', () => {
    const query = buildPageQuery(
      params({
        status: 'pickup',
        point: { lat: 1.5, lng: -2 },
        ordering: [{ field: 'distance', direction: 'DESC' }]
      }),
      20,
      40
    );
    expect(query.text).toContain(
      '(r.pickup_latitude - $1) * (r.pickup_latitude - $1) + (r.pickup_longitude - $2) * (r.pickup_longitude - $2) AS distance'
    );
    expect(query.text).toContain('WHERE r.status = $3');
    expect(query.text).toContain('ORDER BY distance DESC, r.id_ride ASC');
    expect(query.text).toContain('LIMIT $4 OFFSET $5');
    expect(query.values).toEqual([1.5, -2, 'pickup', 20, 40]);
  });

  it('restricts the event query to the page and the window', () => {
    const threshold = hoursAgo(24);
    const query = buildRecentEventsQuery([4, 7], threshold);
    expect(query.text).toContain('WHERE e.id_ride = ANY($1::int[]) AND e.created_at >= $2');
    expect(query.values).toEqual([[4, 7], threshold]);
  });
});

describe('attachRecentEvents', () => {
  it('groups events under their ride and keeps rides without events', () => {
    const threshold = recentEventsThreshold(NOW);
    const recent = eventRow({ id_ride_event: 1, id_ride: 1, created_at: hoursAgo(2) });
    const old = eventRow({ id_ride_event: 2, id_ride: 1, description: 'Some old event', created_at: hoursAgo(48) });
    const otherRide = eventRow({ id_ride_event: 3, id_ride: 9, created_at: hoursAgo(1) });

    const attached = attachRecentEvents(
      [rideRow({ id_ride: 1 }), rideRow({ id_ride: 2 })],
      [recent, old, otherRide],
      threshold
    );

    expect(attached.map(({ ride, events }) => [ride.id_ride, events])).toEqual([
      [1, [recent]],
      [2, []]
    ]);
  });

  it('keeps an event exactly at the threshold', () => {
    const threshold = recentEventsThreshold(NOW);
    const edge = eventRow({ created_at: hoursAgo(24) });
    expect(attachRecentEvents([rideRow()], [edge], threshold)[0].events).toEqual([edge]);
  });
});

describe('fetchRidePage', () => {
  it('issues count, page and event queries in that order', async () => {
    const rides = [rideRow({ id_ride: 1 }), rideRow({ id_ride: 2 })];
    const pool = new MockPool(listResolver(rides, [eventRow({ id_ride: 2 })]));

    const result = await fetchRidePage(pool, params(), NOW);

    expect(pool.queries).toHaveLength(3);
    expect(pool.queries[0].text).toMatch(/^SELECT COUNT\(\*\)/);
    expect(pool.queries[1].text).toContain('FROM ride r');
    expect(pool.queries[2].values).toEqual([[1, 2], new Date('2026-03-09T12:00:00.000Z')]);
    expect(result.page).toEqual({ number: 1, size: 20, count: 2, totalPages: 1 });
    expect(result.rides.map(({ events }) => events.length)).toEqual([0, 1]);
  });

  it('skips the event query for an empty page', async () => {
    const pool = new MockPool(listResolver([], []));
    const result = await fetchRidePage(pool, params(), NOW);

    expect(pool.queries).toHaveLength(2);
    expect(result).toEqual({ rides: [], page: { number: 1, size: 20, count: 0, totalPages: 1 } });
  });

  it('computes the offset from the page number', async () => {
    const pool = new MockPool(listResolver([rideRow({ id_ride: 11 })], [], 11));
    await fetchRidePage(pool, params({ page: { kind: 'number', number: 3 }, pageSize: 5 }), NOW);

    expect(pool.queries[1].values).toEqual([5, 10]);
  });

  it('resolves the last page', async () => {
    const pool = new MockPool(listResolver([rideRow({ id_ride: 41 })], [], 41));
    const result = await fetchRidePage(pool, params({ page: { kind: 'last' } }), NOW);

    expect(result.page).toEqual({ number: 3, size: 20, count: 41, totalPages: 3 });
    expect(pool.queries[1].values).toEqual([20, 40]);
  });

  it('rejects a page past the end before fetching it', async () => {
    const pool = new MockPool(listResolver([], [], 5));

    await expect(fetchRidePage(pool, params({ page: { kind: 'number', number: 2 } }), NOW)).rejects.toThrow(
      NotFoundError
    );
    expect(pool.queries).toHaveLength(1);
  });
});

describe('fetchRide', () => {
  it('loads one ride and filters its own events by the window', async () => {
    const event = eventRow({ id_ride: 7 });
    const pool = new MockPool((text) => (text.includes('FROM ride_event e') ? [event] : [rideRow({ id_ride: 7 })]));

    const result = await fetchRide(pool, 7, NOW);

    expect(result.ride.id_ride).toBe(7);
    expect(result.events).toEqual([event]);
    expect(pool.queries[0].text).toContain('WHERE r.id_ride = $1');
    expect(pool.queries[1].text).toContain('WHERE e.id_ride = $1 AND e.created_at >= $2');
    expect(pool.queries[1].values).toEqual([7, new Date('2026-03-09T12:00:00.000Z')]);
  });

  it('throws NotFoundError for an unknown ride', async () => {
    const pool = new MockPool();

    await expect(fetchRide(pool, 99, NOW)).rejects.toThrow('Ride not found.');
    expect(pool.queries).toHaveLength(1);
  });
});
