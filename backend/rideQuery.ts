import { z } from 'zod';

import type { QueryRunner } from './db';
import {
  InvalidCoordinatesError,
  InvalidOrderingError,
  InvalidPaginationError,
  MissingCoordinatesError,
  NotFoundError
} from './errors';
import {
  countRowSchema,
  rideEventRowSchema,
  rideRowSchema,
  type RideEventRow,
  type RideListQuery,
  type RideRow
} from './schema';

export const DEFAULT_PAGE_SIZE = 20;
export const RECENT_EVENTS_WINDOW_MS = 24 * 60 * 60 * 1000;

export const ORDERING_FIELDS = ['pickup_time', 'distance'] as const;
const ALLOWED_ORDERING = ORDERING_FIELDS.flatMap((field) => [field, `-${field}`]);

export type OrderingField = (typeof ORDERING_FIELDS)[number];

export interface OrderingTerm {
  field: OrderingField;
  direction: 'ASC' | 'DESC';
}

export interface Coordinates {
  lat: number;
  lng: number;
}

export type PageRequest = { kind: 'number'; number: number } | { kind: 'last' };

export interface RideListParams {
  status?: string;
  riderEmail?: string;
  ordering: OrderingTerm[];
  point?: Coordinates;
  page: PageRequest;
  pageSize: number;
}

export interface SqlQuery {
  text: string;
  values: unknown[];
}

export interface RideWithEvents {
  ride: RideRow;
  events: RideEventRow[];
}

export interface PageInfo {
  number: number;
  size: number;
  count: number;
  totalPages: number;
}

export interface RidePageResult {
  rides: RideWithEvents[];
  page: PageInfo;
}

// ===== PARAMETER VALIDATION =====

const DECIMAL_PATTERN = /^[+-]?(\d+(\.\d*)?|\.\d+)([eE][+-]?\d+)?$/;
const POSITIVE_INTEGER_PATTERN = /^\d+$/;

function isOrderingField(value: string): value is OrderingField {
  return ORDERING_FIELDS.some((field) => field === value);
}

export function parseOrdering(raw: string | undefined): OrderingTerm[] {
  if (raw === undefined) {
    return [];
  }

  const terms: OrderingTerm[] = [];
  for (const item of raw.split(',')) {
    const term = item.trim();
    if (term === '') {
      continue;
    }
    const descending = term.startsWith('-');
    const field = descending ? term.slice(1) : term;
    if (!isOrderingField(field)) {
      throw new InvalidOrderingError(term, ALLOWED_ORDERING);
    }
    terms.push({ field, direction: descending ? 'DESC' : 'ASC' });
  }
  return terms;
}

function parseCoordinate(raw: string | undefined): number | undefined {
  if (raw === undefined) {
    return undefined;
  }
  const trimmed = raw.trim();
  if (!DECIMAL_PATTERN.test(trimmed)) {
    throw new InvalidCoordinatesError();
  }
  const value = Number(trimmed);
  // "1e999" matches the pattern but overflows to Infinity
  if (!Number.isFinite(value)) {
    throw new InvalidCoordinatesError();
  }
  return value;
}

function parsePage(raw: string | undefined): PageRequest {
  if (raw === undefined) {
    return { kind: 'number', number: 1 };
  }
  if (raw === 'last') {
    return { kind: 'last' };
  }
  const value = Number(raw);
  if (!POSITIVE_INTEGER_PATTERN.test(raw) || !Number.isSafeInteger(value) || value < 1) {
    throw new InvalidPaginationError('page');
  }
  return { kind: 'number', number: value };
}

function parsePageSize(raw: string | undefined, maxPageSize: number): number {
  if (raw === undefined) {
    return Math.min(DEFAULT_PAGE_SIZE, maxPageSize);
  }
  const value = Number(raw);
  if (!POSITIVE_INTEGER_PATTERN.test(raw) || !Number.isSafeInteger(value) || value < 1) {
    throw new InvalidPaginationError('page_size');
  }
  return Math.min(value, maxPageSize);
}

function nonEmpty(value: string | undefined): string | undefined {
  return value === undefined || value === '' ? undefined : value;
}

/**
 * Validates the list query string. Runs before any store access, so a request
 * that fails here never costs a round trip.
 *
 * Check order: ordering keys, then coordinate presence (distance ordering only),
 * then coordinate format (whenever a coordinate is given), then pagination.
 */
export function parseRideListParams(
  query: RideListQuery,
  options: { maxPageSize: number }
): RideListParams {
  const ordering = parseOrdering(query.ordering);

  const wantsDistance = ordering.some((term) => term.field === 'distance');
  if (wantsDistance && (query.lat === undefined || query.lng === undefined)) {
    throw new MissingCoordinatesError();
  }

  const lat = parseCoordinate(query.lat);
  const lng = parseCoordinate(query.lng);

  return {
    status: nonEmpty(query.status),
    riderEmail: nonEmpty(query.rider_email) ?? nonEmpty(query.rider__email),
    ordering,
    point: lat !== undefined && lng !== undefined ? { lat, lng } : undefined,
    page: parsePage(query.page),
    pageSize: parsePageSize(query.page_size, options.maxPageSize)
  };
}

// ===== SQL COMPOSITION =====

class SqlParams {
  readonly values: unknown[] = [];

  add(value: unknown): string {
    this.values.push(value);
    return `$${this.values.length}`;
  }
}

const RIDE_COLUMNS = `r.id_ride, r.status,
  r.pickup_latitude, r.pickup_longitude, r.dropoff_latitude, r.dropoff_longitude, r.pickup_time,
  rider.id_user AS rider_id, rider.username AS rider_username, rider.first_name AS rider_first_name,
  rider.last_name AS rider_last_name, rider.email AS rider_email, rider.role AS rider_role,
  rider.phone_number AS rider_phone_number,
  driver.id_user AS driver_id, driver.username AS driver_username, driver.first_name AS driver_first_name,
  driver.last_name AS driver_last_name, driver.email AS driver_email, driver.role AS driver_role,
  driver.phone_number AS driver_phone_number`;

const RIDE_FROM = `FROM ride r
LEFT JOIN "user" rider ON rider.id_user = r.id_rider
LEFT JOIN "user" driver ON driver.id_user = r.id_driver`;

const EVENT_COLUMNS = 'e.id_ride_event, e.id_ride, e.description, e.created_at';

function buildWhere(params: RideListParams, sql: SqlParams): string {
  const conditions: string[] = [];
  if (params.status !== undefined) {
    conditions.push(`r.status = ${sql.add(params.status)}`);
  }
  if (params.riderEmail !== undefined) {
    conditions.push(`rider.email = ${sql.add(params.riderEmail)}`);
  }
  return conditions.length > 0 ? `WHERE ${conditions.join(' AND ')}` : '';
}

export function buildCountQuery(params: RideListParams): SqlQuery {
  const sql = new SqlParams();
  const where = buildWhere(params, sql);
  return {
    text: [`SELECT COUNT(*)::int AS count`, RIDE_FROM, where].filter(Boolean).join('\n'),
    values: sql.values
  };
}

/**
 * Planar squared distance from the pickup point. Not geodesic: it is wrong across
 * the antimeridian and distorted towards the poles, but the store can sort and
 * paginate on it without loading the table.
 */
function distanceExpression(point: Coordinates, sql: SqlParams): string {
  const lat = sql.add(point.lat);
  const lng = sql.add(point.lng);
  return (
    `(r.pickup_latitude - ${lat}) * (r.pickup_latitude - ${lat}) + ` +
    `(r.pickup_longitude - ${lng}) * (r.pickup_longitude - ${lng})`
  );
}

export function buildPageQuery(params: RideListParams, limit: number, offset: number): SqlQuery {
  const sql = new SqlParams();
  const columns = params.point
    ? `${RIDE_COLUMNS},\n  ${distanceExpression(params.point, sql)} AS distance`
    : RIDE_COLUMNS;
  const where = buildWhere(params, sql);

  const orderBy = params.ordering.map((term) =>
    term.field === 'distance' ? `distance ${term.direction}` : `r.pickup_time ${term.direction}`
  );
  orderBy.push('r.id_ride ASC');

  return {
    text: [
      `SELECT ${columns}`,
      RIDE_FROM,
      where,
      `ORDER BY ${orderBy.join(', ')}`,
      `LIMIT ${sql.add(limit)} OFFSET ${sql.add(offset)}`
    ]
      .filter(Boolean)
      .join('\n'),
    values: sql.values
  };
}

export function buildRecentEventsQuery(rideIds: number[], threshold: Date): SqlQuery {
  return {
    text: [
      `SELECT ${EVENT_COLUMNS}`,
      'FROM ride_event e',
      'WHERE e.id_ride = ANY($1::int[]) AND e.created_at >= $2',
      'ORDER BY e.created_at ASC, e.id_ride_event ASC'
    ].join('\n'),
    values: [rideIds, threshold]
  };
}

// ===== EXECUTION =====

export function recentEventsThreshold(now: Date): Date {
  return new Date(now.getTime() - RECENT_EVENTS_WINDOW_MS);
}

function parseRows<T extends z.ZodTypeAny>(schema: T, rows: unknown[]): z.infer<T>[] {
  return z.array(schema).parse(rows);
}

/**
 * Groups windowed events under their rides. Events older than the threshold or
 * belonging to rides outside the page are dropped; rides without events get [].
 */
export function attachRecentEvents(
  rides: RideRow[],
  events: RideEventRow[],
  threshold: Date
): RideWithEvents[] {
  const byRide = new Map<number, RideEventRow[]>();
  for (const event of events) {
    if (event.created_at.getTime() < threshold.getTime()) {
      continue;
    }
    const group = byRide.get(event.id_ride);
    if (group) {
      group.push(event);
    } else {
      byRide.set(event.id_ride, [event]);
    }
  }

  return rides.map((ride) => ({ ride, events: byRide.get(ride.id_ride) ?? [] }));
}

function resolvePageNumber(request: PageRequest, count: number, size: number): PageInfo {
  const totalPages = Math.max(1, Math.ceil(count / size));
  const number = request.kind === 'last' ? totalPages : request.number;
  if (number > totalPages) {
    throw new NotFoundError('Invalid page.');
  }
  return { number, size, count, totalPages };
}

/**
 * Loads one page of rides in at most three round trips: count, page, and the
 * recent events of the rides on that page. `now` is read once per request.
 */
export async function fetchRidePage(
  store: QueryRunner,
  params: RideListParams,
  now: Date
): Promise<RidePageResult> {
  const threshold = recentEventsThreshold(now);

  const countQuery = buildCountQuery(params);
  const countResult = await store.query(countQuery.text, countQuery.values);
  const { count } = countRowSchema.parse(countResult.rows[0]);

  const page = resolvePageNumber(params.page, count, params.pageSize);

  const pageQuery = buildPageQuery(params, page.size, (page.number - 1) * page.size);
  const pageResult = await store.query(pageQuery.text, pageQuery.values);
  const rides = parseRows(rideRowSchema, pageResult.rows);

  let events: RideEventRow[] = [];
  if (rides.length > 0) {
    const eventsQuery = buildRecentEventsQuery(
      rides.map((ride) => ride.id_ride),
      threshold
    );
    const eventsResult = await store.query(eventsQuery.text, eventsQuery.values);
    events = parseRows(rideEventRowSchema, eventsResult.rows);
  }

  return { rides: attachRecentEvents(rides, events, threshold), page };
}

/*
  Single-ride retrieval. Filters the ride's own events by the window; the list
  path never goes through here.
*/
export async function fetchRide(store: QueryRunner, rideId: number, now: Date): Promise<RideWithEvents> {
  const rideResult = await store.query(
    `SELECT ${RIDE_COLUMNS}\n${RIDE_FROM}\nWHERE r.id_ride = $1`,
    [rideId]
  );
  const [ride] = parseRows(rideRowSchema, rideResult.rows);
  if (!ride) {
    throw new NotFoundError('Ride not found.');
  }

  const threshold = recentEventsThreshold(now);
  const eventsResult = await store.query(
    [
      `SELECT ${EVENT_COLUMNS}`,
      'FROM ride_event e',
      'WHERE e.id_ride = $1 AND e.created_at >= $2',
      'ORDER BY e.created_at ASC, e.id_ride_event ASC'
    ].join('\n'),
    [rideId, threshold]
  );

  return { ride, events: parseRows(rideEventRowSchema, eventsResult.rows) };
}
