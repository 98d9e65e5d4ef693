import type { PageInfo, RideWithEvents } from './rideQuery';
import type { Ride, RideEvent, RideEventRow, RidePage, RideRow, User } from './schema';

type UserPrefix = 'rider' | 'driver';

/*
  The joined user columns are all null when the reference was cleared
  (user deleted) or never set.
*/
export function serializeUser(row: RideRow, prefix: UserPrefix): User | null {
  const id = prefix === 'rider' ? row.rider_id : row.driver_id;
  if (id === null) {
    return null;
  }

  if (prefix === 'rider') {
    return {
      id,
      username: row.rider_username ?? '',
      first_name: row.rider_first_name ?? '',
      last_name: row.rider_last_name ?? '',
      email: row.rider_email ?? '',
      role: row.rider_role ?? '',
      phone_number: row.rider_phone_number ?? ''
    };
  }

  return {
    id,
    username: row.driver_username ?? '',
    first_name: row.driver_first_name ?? '',
    last_name: row.driver_last_name ?? '',
    email: row.driver_email ?? '',
    role: row.driver_role ?? '',
    phone_number: row.driver_phone_number ?? ''
  };
}

export function serializeRideEvent(event: RideEventRow): RideEvent {
  return {
    id: event.id_ride_event,
    description: event.description,
    created_at: event.created_at.toISOString()
  };
}

export function serializeRide({ ride, events }: RideWithEvents): Ride {
  return {
    id: ride.id_ride,
    status: ride.status,
    rider: serializeUser(ride, 'rider'),
    driver: serializeUser(ride, 'driver'),
    pickup_latitude: ride.pickup_latitude,
    pickup_longitude: ride.pickup_longitude,
    dropoff_latitude: ride.dropoff_latitude,
    dropoff_longitude: ride.dropoff_longitude,
    pickup_time: ride.pickup_time ? ride.pickup_time.toISOString() : null,
    events: events.map(serializeRideEvent)
  };
}

export function isAbsoluteUrl(value: string): boolean {
  try {
    new URL(value);
    return true;
  } catch {
    return false;
  }
}

// Only used to resolve relative request paths; never appears in a link.
const RELATIVE_BASE = 'http://localhost';

/**
 * URL of another page of the same listing. Page 1 is addressed by dropping the
 * `page` parameter. A relative request path gives a relative link.
 */
export function pageUrl(requestUrl: string, pageNumber: number): string {
  const url = new URL(requestUrl, RELATIVE_BASE);
  if (pageNumber === 1) {
    url.searchParams.delete('page');
  } else {
    url.searchParams.set('page', String(pageNumber));
  }
  return isAbsoluteUrl(requestUrl) ? url.toString() : `${url.pathname}${url.search}`;
}

export function serializeRidePage(
  rides: RideWithEvents[],
  page: PageInfo,
  requestUrl: string
): RidePage {
  return {
    count: page.count,
    next: page.number < page.totalPages ? pageUrl(requestUrl, page.number + 1) : null,
    previous: page.number > 1 ? pageUrl(requestUrl, page.number - 1) : null,
    results: rides.map(serializeRide)
  };
}
