import { afterEach, describe, expect, it } from 'vitest';
import { mkdtempSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { createJsonConnector } from '@gaugelink/connector-file';
import { loadFeatureCollection, parseFeatureCollection } from '../src/features/index.js';
import { MalformedInputError } from '../src/errors/index.js';

let tmpDir = '';

function makeTmpDir(): string {
  tmpDir = mkdtempSync(join(tmpdir(), 'features-'));
  return tmpDir;
}

afterEach(() => {
  if (tmpDir) {
    rmSync(tmpDir, { recursive: true, force: true });
    tmpDir = '';
  }
});

describe('parseFeatureCollection', () => {
  it('keeps every member in its original order', () => {
    const document = {
      type: 'FeatureCollection',
      name: 'River Gauges',
      features: [
        {
          type: 'Feature',
          properties: { name: 'Avoca River at Charlton', id: '101', source: 'old' },
          geometry: { type: 'Point', coordinates: [143.35, -36.27] },
        },
        { type: 'Feature', properties: null, geometry: null },
      ],
      crs: { type: 'name' },
    };

    const collection = parseFeatureCollection(document, 'source.geojson');

    expect(collection).toEqual(document);
    expect(Object.keys(collection)).toEqual(['type', 'name', 'features', 'crs']);
    expect(Object.keys(collection.features[0] ?? {})).toEqual(['type', 'properties', 'geometry']);
    expect(Object.keys(collection.features[0]?.properties ?? {})).toEqual(['name', 'id', 'source']);
  });

  it('accepts features without properties', () => {
    const collection = parseFeatureCollection(
      { features: [{ type: 'Feature' }] },
      'source.geojson'
    );

    expect(collection.features[0]?.properties).toBeUndefined();
  });

  it('rejects documents without a features array', () => {
    expect(() => parseFeatureCollection({ type: 'FeatureCollection' }, 'source.geojson')).toThrow(
      'source.geojson: Not a feature collection: features: Required'
    );
    expect(() => parseFeatureCollection([], 'source.geojson')).toThrow(MalformedInputError);
  });

  it('rejects features whose properties are not an object', () => {
    expect(() =>
      parseFeatureCollection(
        { features: [{ properties: { id: '1' } }, { properties: 'id=2' }] },
        'source.geojson'
      )
    ).toThrow(/^source\.geojson: Not a feature collection: features\.1\.properties: /);
  });
});

describe('loadFeatureCollection', () => {
  it('loads a GeoJSON file through the JSON connector', async () => {
    const filePath = join(makeTmpDir(), 'source.geojson');
    writeFileSync(
      filePath,
      JSON.stringify({
        type: 'FeatureCollection',
        features: [{ type: 'Feature', properties: { id: '101', name: 'Avoca' } }],
      }),
      'utf-8'
    );

    const collection = await loadFeatureCollection(
      createJsonConnector({ id: 'features', name: 'features', filePath, recordsPath: 'features' })
    );

    expect(collection.features).toHaveLength(1);
    expect(collection.features[0]?.properties).toEqual({ id: '101', name: 'Avoca' });
  });

  it('reports invalid JSON as malformed input naming the file', async () => {
    const filePath = join(makeTmpDir(), 'broken.geojson');
    writeFileSync(filePath, '{"type": "FeatureCollection", "features": [', 'utf-8');

    await expect(
      loadFeatureCollection(
        createJsonConnector({ id: 'features', name: 'features', filePath, recordsPath: 'features' })
      )
    ).rejects.toMatchObject({ code: 'MALFORMED_INPUT', source: filePath });
  });

  it('reports a missing features array as malformed input', async () => {
    const filePath = join(makeTmpDir(), 'empty.geojson');
    writeFileSync(filePath, '{"type": "FeatureCollection"}', 'utf-8');

    await expect(
      loadFeatureCollection(
        createJsonConnector({ id: 'features', name: 'features', filePath, recordsPath: 'features' })
      )
    ).rejects.toBeInstanceOf(MalformedInputError);
  });
});
