import { z } from 'zod';

/*
  Row schemas: what the ride queries select from PostgreSQL.
  Timestamps arrive as Date objects from node-postgres.
*/

export const countRowSchema = z.object({
  count: z.number().int().nonnegative()
});

export const rideRowSchema = z.object({
  id_ride: z.number().int(),
  status: z.string(),
  pickup_latitude: z.number(),
  pickup_longitude: z.number(),
  dropoff_latitude: z.number().nullable(),
  dropoff_longitude: z.number().nullable(),
  pickup_time: z.date().nullable(),
  distance: z.number().optional(),
  rider_id: z.number().int().nullable(),
  rider_username: z.string().nullable(),
  rider_first_name: z.string().nullable(),
  rider_last_name: z.string().nullable(),
  rider_email: z.string().nullable(),
  rider_role: z.string().nullable(),
  rider_phone_number: z.string().nullable(),
  driver_id: z.number().int().nullable(),
  driver_username: z.string().nullable(),
  driver_first_name: z.string().nullable(),
  driver_last_name: z.string().nullable(),
  driver_email: z.string().nullable(),
  driver_role: z.string().nullable(),
  driver_phone_number: z.string().nullable()
});

export const rideEventRowSchema = z.object({
  id_ride_event: z.number().int(),
  id_ride: z.number().int(),
  description: z.string(),
  created_at: z.date()
});

export type RideRow = z.infer<typeof rideRowSchema>;
export type RideEventRow = z.infer<typeof rideEventRowSchema>;

/*
  Wire schemas: the JSON representation served by the ride endpoints.
*/

export const userSchema = z.object({
  id: z.number().int(),
  username: z.string(),
  first_name: z.string(),
  last_name: z.string(),
  email: z.string(),
  role: z.string(),
  phone_number: z.string()
});

export const rideEventSchema = z.object({
  id: z.number().int(),
  description: z.string(),
  created_at: z.string().datetime()
});

export const rideSchema = z.object({
  id: z.number().int(),
  status: z.string(),
  rider: userSchema.nullable(),
  driver: userSchema.nullable(),
  pickup_latitude: z.number(),
  pickup_longitude: z.number(),
  dropoff_latitude: z.number().nullable(),
  dropoff_longitude: z.number().nullable(),
  pickup_time: z.string().datetime().nullable(),
  events: z.array(rideEventSchema)
});

export const ridePageSchema = z.object({
  count: z.number().int().nonnegative(),
  next: z.string().nullable(),
  previous: z.string().nullable(),
  results: z.array(rideSchema)
});

export type User = z.infer<typeof userSchema>;
export type RideEvent = z.infer<typeof rideEventSchema>;
export type Ride = z.infer<typeof rideSchema>;
export type RidePage = z.infer<typeof ridePageSchema>;

/*
  Raw query-string shape accepted by GET /api/rides. Repeated parameters
  (arrays) and nested objects are rejected here.
*/
export const rideListQuerySchema = z.object({
  status: z.string().optional(),
  rider_email: z.string().optional(),
  rider__email: z.string().optional(),
  ordering: z.string().optional(),
  lat: z.string().optional(),
  lng: z.string().optional(),
  page: z.string().optional(),
  page_size: z.string().optional()
});

export type RideListQuery = z.infer<typeof rideListQuerySchema>;

export const tokenPayloadSchema = z.object({
  user_id: z.number().int(),
  email: z.string(),
  role: z.string()
});

export type TokenPayload = z.infer<typeof tokenPayloadSchema>;
