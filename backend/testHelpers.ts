import jwt, { type SignOptions } from 'jsonwebtoken';

import type { AppConfig } from './config';
import type { QueryRunner } from './db';
import type { RideEventRow, RideRow } from './schema';

export const TEST_SECRET = 'test-secret';

export const testConfig: AppConfig = {
  NODE_ENV: 'test',
  PORT: 3000,
  DATABASE_SSL: false,
  PGPORT: 5432,
  JWT_SECRET: TEST_SECRET,
  FRONTEND_URL: 'http://localhost:5173',
  PRIVILEGED_ROLE: 'admin',
  MAX_PAGE_SIZE: 100,
  LOG_FORMAT: 'tiny'
};

export interface RecordedQuery {
  text: string;
  values: unknown[];
}

export type Resolver = (text: string, values: unknown[]) => unknown[];

/*
  In-process stand-in for the pg pool. Every statement is recorded; rows come
  from the resolver.
*/
export class MockPool implements QueryRunner {
  readonly queries: RecordedQuery[] = [];

  constructor(private resolver: Resolver = () => []) {}

  async query(text: string, values: unknown[] = []): Promise<{ rows: unknown[] }> {
    this.queries.push({ text, values });
    return { rows: this.resolver(text, values) };
  }
}

export function signToken(
  claims: { user_id: number; email: string; role: string },
  options: SignOptions = { expiresIn: '1h' },
  secret: string = TEST_SECRET
): string {
  return jwt.sign(claims, secret, options);
}

export const adminToken = () => signToken({ user_id: 1, email: 'admin@example.com', role: 'admin' });
export const riderToken = () => signToken({ user_id: 2, email: 'rider@example.com', role: 'user' });

export const NOW = new Date('2026-03-10T12:00:00.000Z');

export function hoursAgo(hours: number): Date {
  return new Date(NOW.getTime() - hours * 60 * 60 * 1000);
}

export function rideRow(overrides: Partial<RideRow> = {}): RideRow {
  return {
    id_ride: 1,
    status: 'en-route',
    pickup_latitude: 0,
    pickup_longitude: 0,
    dropoff_latitude: null,
    dropoff_longitude: null,
    pickup_time: hoursAgo(0.5),
    rider_id: 2,
    rider_username: 'rider',
    rider_first_name: 'Rita',
    rider_last_name: 'Rider',
    rider_email: 'rider@example.com',
    rider_role: 'user',
    rider_phone_number: '555-0100',
    driver_id: 3,
    driver_username: 'driver',
    driver_first_name: 'Dan',
    driver_last_name: 'Driver',
    driver_email: 'driver@example.com',
    driver_role: 'user',
    driver_phone_number: '',
    ...overrides
  };
}

export function withoutUsers(row: RideRow): RideRow {
  return {
    ...row,
    rider_id: null,
    rider_username: null,
    rider_first_name: null,
    rider_last_name: null,
    rider_email: null,
    rider_role: null,
    rider_phone_number: null,
    driver_id: null,
    driver_username: null,
    driver_first_name: null,
    driver_last_name: null,
    driver_email: null,
    driver_role: null,
    driver_phone_number: null
  };
}

export function eventRow(overrides: Partial<RideEventRow> = {}): RideEventRow {
  return {
    id_ride_event: 1,
    id_ride: 1,
    description: 'Status changed to pickup',
    created_at: hoursAgo(1),
    ...overrides
  };
}

/*
  Resolver answering the three list queries: count, page, recent events.
*/
export function listResolver(rides: RideRow[], events: RideEventRow[], count = rides.length): Resolver {
  return (text) => {
    if (text.startsWith('SELECT COUNT(*)')) {
      return [{ count }];
    }
    if (text.includes('FROM ride_event e')) {
      return events;
    }
    if (text.includes('FROM ride r')) {
      return rides;
    }
    return [];
  };
}
