import { Router, type Request } from 'express';

import { requireRole } from './auth';
import type { AppConfig } from './config';
import type { QueryRunner } from './db';
import { ValidationError } from './errors';
import { fetchRide, fetchRidePage, parseRideListParams } from './rideQuery';
import { isAbsoluteUrl, serializeRide, serializeRidePage } from './rideSerializer';
import { rideListQuerySchema } from './schema';

export interface RideRouterDeps {
  store: QueryRunner;
  config: Pick<AppConfig, 'JWT_SECRET' | 'PRIVILEGED_ROLE' | 'MAX_PAGE_SIZE'>;
  now: () => Date;
}

const MAX_RIDE_ID = 2147483647;

/*
  Absolute URL of the request when the Host header makes one, else its path.
*/
function requestUrlOf(req: Request): string {
  const host = req.get('host');
  if (host) {
    const absolute = `${req.protocol}://${host}${req.originalUrl}`;
    if (isAbsoluteUrl(absolute)) {
      return absolute;
    }
  }
  return req.originalUrl;
}

export function createRideRouter({ store, config, now }: RideRouterDeps): Router {
  const router = Router();

  router.use(requireRole(config.PRIVILEGED_ROLE, config.JWT_SECRET));

  /*
    List rides endpoint
    Filters: status, rider_email. Ordering: pickup_time, distance (needs lat/lng).
    Each ride carries its events from the last 24 hours.
  */
  router.get('/', async (req, res, next) => {
    try {
      const query = rideListQuerySchema.safeParse(req.query);
      if (!query.success) {
        throw new ValidationError('Query parameters must be single values', 'INVALID_QUERY', query.error.issues);
      }

      const params = parseRideListParams(query.data, { maxPageSize: config.MAX_PAGE_SIZE });
      const { rides, page } = await fetchRidePage(store, params, now());
      res.json(serializeRidePage(rides, page, requestUrlOf(req)));
    } catch (error) {
      next(error);
    }
  });

  /*
    Get a single ride by id, with its events from the last 24 hours
  */
  router.get('/:ride_id', async (req, res, next) => {
    try {
      const { ride_id } = req.params;
      const rideId = Number(ride_id);

      if (!/^\d+$/.test(ride_id) || rideId < 1 || rideId > MAX_RIDE_ID) {
        throw new ValidationError('Ride ID must be a positive integer');
      }

      res.json(serializeRide(await fetchRide(store, rideId, now())));
    } catch (error) {
      next(error);
    }
  });

  return router;
}
