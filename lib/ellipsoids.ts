/**
 * Reference Ellipsoid Models
 *
 * Loads and caches reference ellipsoids from JSON files under data/ellipsoids/.
 */

import { readFileSync, readdirSync } from 'fs';
import { join, dirname } from 'path';
import { fileURLToPath } from 'url';
import type { EllipsoidModel } from './types.js';

const __filename = fileURLToPath(import.meta.url);
const __dirname = dirname(__filename);

// Path to data directory (relative to lib/ or dist/)
const DATA_DIR = join(__dirname, '..', 'data');

/**
 * Default model name
 */
export const DEFAULT_ELLIPSOID = 'wgs84';

/**
 * Reference ellipsoid of revolution
 *
 * Latitudes passed to the radius methods are geodetic, in radians.
 */
export class Ellipsoid {
  /** Registry key (e.g., "wgs84") */
  readonly id: string;
  readonly name: string;
  readonly description: string;
  readonly source: string;
  /** Semi-major axis (m) */
  readonly a: number;
  readonly invFlattening: number;

  constructor(id: string, model: EllipsoidModel) {
    this.id = id;
    this.name = model.name;
    this.description = model.description;
    this.source = model.source;
    this.a = model.a;
    this.invFlattening = model.invFlattening;
  }

  /** Flattening */
  get f(): number {
    return 1 / this.invFlattening;
  }

  /** Semi-minor axis (m) */
  get b(): number {
    return this.a * (1 - this.f);
  }

  /** First eccentricity squared */
  get e2(): number {
    return this.f * (2 - this.f);
  }

  get equatorialCircumference(): number {
    return 2 * Math.PI * this.a;
  }

  /**
   * Meridian length, pole to pole and back (m).
   * Ramanujan's second approximation for the ellipse perimeter.
   */
  get polarCircumference(): number {
    const { a, b } = this;
    const h = ((a - b) * (a - b)) / ((a + b) * (a + b));
    return Math.PI * (a + b) * (1 + (3 * h) / (10 + Math.sqrt(4 - 3 * h)));
  }

  /**
   * Prime-vertical radius of curvature (m)
   */
  nRad(lat: number): number {
    const s = Math.sin(lat);
    return this.a / Math.sqrt(1 - this.e2 * s * s);
  }

  /**
   * Meridional radius of curvature (m)
   */
  mRad(lat: number): number {
    const s = Math.sin(lat);
    return (this.a * (1 - this.e2)) / Math.pow(1 - this.e2 * s * s, 1.5);
  }

  /**
   * Distance from the centre to the surface at a geodetic latitude (m)
   */
  geocentricRadius(lat: number): number {
    const { a, b } = this;
    const c = Math.cos(lat);
    const s = Math.sin(lat);
    const num = (a * a * c) ** 2 + (b * b * s) ** 2;
    const den = (a * c) ** 2 + (b * s) ** 2;
    return Math.sqrt(num / den);
  }

  toModel(): EllipsoidModel {
    return {
      name: this.name,
      description: this.description,
      source: this.source,
      a: this.a,
      invFlattening: this.invFlattening,
    };
  }
}

// Cached models
const ellipsoidModels: Map<string, EllipsoidModel> = new Map();
const ellipsoids: Map<string, Ellipsoid> = new Map();

function isEllipsoidModel(value: unknown): value is EllipsoidModel {
  if (typeof value !== 'object' || value === null) {
    return false;
  }
  return (
    'name' in value &&
    typeof value.name === 'string' &&
    'description' in value &&
    typeof value.description === 'string' &&
    'source' in value &&
    typeof value.source === 'string' &&
    'a' in value &&
    typeof value.a === 'number' &&
    value.a > 0 &&
    'invFlattening' in value &&
    typeof value.invFlattening === 'number' &&
    value.invFlattening > 1
  );
}

/**
 * Load all ellipsoid models from data/ellipsoids/ directory
 */
function loadEllipsoidModels(): void {
  if (ellipsoidModels.size > 0) {
    return; // Already loaded
  }

  const dir = join(DATA_DIR, 'ellipsoids');
  const files = readdirSync(dir).filter((f) => f.endsWith('.json'));

  for (const file of files) {
    const id = file.replace('.json', '');
    const content: unknown = JSON.parse(readFileSync(join(dir, file), 'utf-8'));
    if (!isEllipsoidModel(content)) {
      throw new Error(`Malformed ellipsoid model: ${file}`);
    }
    ellipsoidModels.set(id, content);
  }
}

/**
 * Get list of available ellipsoid names
 */
export function getEllipsoidNames(): string[] {
  loadEllipsoidModels();
  return Array.from(ellipsoidModels.keys()).sort();
}

export function isEllipsoidName(name: string): boolean {
  loadEllipsoidModels();
  return ellipsoidModels.has(name);
}

/**
 * Get the raw model record for a name
 */
export function getEllipsoidModel(name: string): EllipsoidModel | undefined {
  loadEllipsoidModels();
  return ellipsoidModels.get(name);
}

/**
 * Get a (cached) ellipsoid instance by name
 */
export function getEllipsoid(name: string): Ellipsoid | undefined {
  const cached = ellipsoids.get(name);
  if (cached) {
    return cached;
  }

  const model = getEllipsoidModel(name);
  if (!model) {
    return undefined;
  }

  const ellipsoid = new Ellipsoid(name, model);
  ellipsoids.set(name, ellipsoid);
  return ellipsoid;
}

/**
 * The WGS-84 ellipsoid
 */
export function defaultEllipsoid(): Ellipsoid {
  const ellipsoid = getEllipsoid(DEFAULT_ELLIPSOID);
  if (!ellipsoid) {
    throw new Error(`Default ellipsoid '${DEFAULT_ELLIPSOID}' is missing from ${DATA_DIR}`);
  }
  return ellipsoid;
}

/**
 * Get all available models organized by category
 */
export function getAllModels(): { ellipsoids: string[] } {
  return {
    ellipsoids: getEllipsoidNames(),
  };
}
