/**
 * Sub-solar fix benchmark - raw performance without HTTP overhead
 *
 * Usage: npx tsx lib/benchmark.ts [days] [step]
 *   days: length of the simulated track in days (default: 365)
 *   step: time step in seconds (default: 60)
 */

import { computeFix } from './solar.js';
import { getEllipsoid } from './ellipsoids.js';
import { SECONDS_PER_DAY } from './ephemeris.js';

function benchmark(days: number, stepSeconds: number): void {
  const ellipsoid = getEllipsoid('wgs84');
  if (!ellipsoid) {
    throw new Error('Failed to load wgs84 ellipsoid');
  }

  const t0 = Date.parse('2024-01-01T00:00:00Z');
  const points = Math.floor((days * SECONDS_PER_DAY) / stepSeconds) + 1;

  console.log(`Benchmark Configuration:`);
  console.log(`  Days:           ${days.toLocaleString()}`);
  console.log(`  Step size:      ${stepSeconds}s`);
  console.log(`  Fixes:          ${points.toLocaleString()}`);
  console.log(`\nRunning benchmark...`);

  const startTime = performance.now();

  let maxSpeed = 0;
  for (let i = 0; i < points; i++) {
    const fix = computeFix(new Date(t0 + i * stepSeconds * 1000), ellipsoid);
    maxSpeed = Math.max(maxSpeed, fix.speed);
  }

  const wallTimeMs = performance.now() - startTime;
  const wallTimeSec = wallTimeMs / 1000;

  console.log(`\n=== Results ===`);
  console.log(`  Wall time:      ${wallTimeSec.toFixed(3)}s`);
  console.log(`  Fixes:          ${points.toLocaleString()}`);
  console.log(`  Throughput:     ${(points / wallTimeSec).toLocaleString(undefined, { maximumFractionDigits: 0 })} fix/s`);
  console.log(`  Per fix:        ${((wallTimeMs * 1000) / points).toFixed(2)}us`);
  console.log(`  Max speed:      ${maxSpeed.toFixed(2)} m/s`);
}

// Parse CLI arguments
const days = parseInt(process.argv[2] || '365', 10);
const step = parseInt(process.argv[3] || '60', 10);

try {
  benchmark(days, step);
} catch (err) {
  console.error(err);
  process.exit(1);
}
