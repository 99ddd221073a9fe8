export {
  featurePropertiesSchema,
  featureSchema,
  featureCollectionSchema,
} from './schemas.js';
