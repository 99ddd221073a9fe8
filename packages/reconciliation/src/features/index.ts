export { parseFeatureCollection, loadFeatureCollection } from './feature-collection.js';
export type { DocumentConnector } from './feature-collection.js';
