#!/usr/bin/env node
import {
  createConfig,
  geoTzLookup,
  IpInfoLocator,
  NominatimGeocoder,
} from '@daylight/core';
import { run } from './run.js';

const config = createConfig();

process.exitCode = await run(process.argv.slice(2), {
  stdout: process.stdout,
  stderr: process.stderr,
  now: () => new Date(),
  ipLocator: new IpInfoLocator(config),
  geocoder: new NominatimGeocoder(config),
  zoneLookup: geoTzLookup,
});
