#!/usr/bin/env node
/**
 * CLI entry point
 *
 * Usage:
 *   gaugelink --config ./gaugelink.json
 *   gaugelink --links links.csv --features source.geojson --out "River Gauges.geojson"
 */

import { main } from './main.js';

main(process.argv.slice(2)).then(
  (code) => {
    process.exitCode = code;
  },
  (error: unknown) => {
    console.error(error);
    process.exitCode = 1;
  }
);
