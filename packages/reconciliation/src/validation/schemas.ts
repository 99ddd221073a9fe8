/**
 * Zod schemas for feature documents
 *
 * Records and intersections are used instead of plain objects so that parsed
 * output keeps every member of the input in its original key order.
 */

import { z } from 'zod';

export const featurePropertiesSchema = z.record(z.unknown());

export const featureSchema = z
  .record(z.unknown())
  .and(z.object({ properties: featurePropertiesSchema.nullable().optional() }));

export const featureCollectionSchema = z
  .record(z.unknown())
  .and(z.object({ features: z.array(featureSchema) }));
