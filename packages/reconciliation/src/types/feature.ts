/**
 * Feature Collection Types
 */

import type { z } from 'zod';
import type {
  featureCollectionSchema,
  featureSchema,
  featurePropertiesSchema,
} from '../validation/schemas.js';

/** Attribute bag of a feature; `id`, `name` and `source` are the keys read or written */
export type FeatureProperties = z.infer<typeof featurePropertiesSchema>;

/** A feature; every member other than `properties` is carried through unchanged */
export type Feature = z.infer<typeof featureSchema>;

/** A FeatureCollection-shaped document with a `features` array */
export type FeatureCollection = z.infer<typeof featureCollectionSchema>;
