/**
 * Sub-Solar Point REST API
 *
 * Express application exposing the calculator over HTTP.
 */

import express, { Request, Response, NextFunction, type Express } from 'express';
import swaggerUi from 'swagger-ui-express';
import YAML from 'yamljs';
import { fileURLToPath } from 'url';
import { dirname, join } from 'path';
import { getAllModels, getEllipsoidModel } from './ellipsoids.js';
import { SolarPositionError } from './errors.js';
import { inverse } from './geodesy.js';
import { parseEllipsoid, parseInstant, parseStation, parseTrackRange } from './query.js';
import { computeFix, computeTrack } from './solar.js';

const __filename = fileURLToPath(import.meta.url);
const __dirname = dirname(__filename);

export interface AppOptions {
  /** Ellipsoid used when a request names none */
  defaultModel: string;
  /** Identifies this build in the access log */
  gitHash: string;
  /** Identifies this process in the access log */
  serverId: string;
}

// Request logging middleware
function requestLogger(options: AppOptions) {
  return (req: Request, res: Response, next: NextFunction): void => {
    res.on('finish', () => {
      const timestamp = new Date().toISOString().replace('Z', '+00:00');
      const ip = req.ip || req.socket.remoteAddress || '-';
      const size = res.getHeader('content-length') ?? '-';

      console.log(
        `${timestamp} - ${ip} - [hash:${options.gitHash} srv:${options.serverId}] "${req.method} ${req.originalUrl} HTTP/${req.httpVersion}" ${res.statusCode} ${size}`
      );
    });

    next();
  };
}

/**
 * Create the Express application
 */
export function createApp(options: AppOptions): Express {
  const app = express();
  app.use(express.json());
  app.use(requestLogger(options));

  // Load OpenAPI spec and serve Swagger UI
  const openapiSpec: Record<string, unknown> = YAML.load(join(__dirname, '..', 'openapi.yaml'));
  app.use('/api/docs', swaggerUi.serve, swaggerUi.setup(openapiSpec, {
    customSiteTitle: 'Sub-Solar Point API',
    customCss: '.swagger-ui .topbar { display: none }'
  }));

  // Serve OpenAPI spec as JSON
  app.get('/api/openapi.json', (_req: Request, res: Response) => {
    res.json(openapiSpec);
  });

  /**
   * GET /api/sun/point
   * Sub-solar fix at an instant
   *
   * Query: ?time=<ISO-8601|epoch ms>[&model=<ellipsoid>]
   */
  app.get('/api/sun/point', (req: Request, res: Response) => {
    const instant = parseInstant(req.query.time);
    const ellipsoid = parseEllipsoid(req.query.model, options.defaultModel);

    res.json({
      fix: computeFix(instant, ellipsoid),
      model: ellipsoid.id,
      utc: instant.toISOString(),
    });
  });

  /**
   * GET /api/sun/bearing
   * Bearing and distance from a station to the sub-solar point
   *
   * Query: ?lat=<deg>&lon=<deg>[&time=<ISO-8601|epoch ms>][&model=<ellipsoid>]
   */
  app.get('/api/sun/bearing', (req: Request, res: Response) => {
    const station = parseStation(req.query.lat, req.query.lon);
    const instant = parseInstant(req.query.time);
    const ellipsoid = parseEllipsoid(req.query.model, options.defaultModel);

    const fix = computeFix(instant, ellipsoid);
    const solution = inverse(station, fix);

    res.json({
      fix,
      station,
      bearing: solution.forwardAzimuth,
      backAzimuth: solution.backAzimuth,
      distance: solution.distance,
      model: ellipsoid.id,
      utc: instant.toISOString(),
    });
  });

  /**
   * GET /api/sun/track
   * Sub-solar ground track over a time range
   *
   * Query: ?t0=<UTC>&tf=<UTC>&step=<number>[&unit=sec|min][&model=<ellipsoid>]
   */
  app.get('/api/sun/track', (req: Request, res: Response) => {
    const { t0, tf, step, unit } = req.query;
    const range = parseTrackRange({ t0, tf, step, unit });
    const ellipsoid = parseEllipsoid(req.query.model, options.defaultModel);
    const fixes = computeTrack(range, ellipsoid);

    res.json({
      fixes,
      count: fixes.length,
      model: ellipsoid.id,
      t0: range.start.toISOString(),
      tf: range.end.toISOString(),
      step: range.stepSeconds,
      unit: range.unit,
    });
  });

  /**
   * GET /api/sun/health
   * Health check endpoint
   */
  app.get('/api/sun/health', (_req: Request, res: Response) => {
    res.json({ status: 'ok', defaultModel: options.defaultModel });
  });

  /**
   * GET /api/models/
   * List all available ellipsoids
   */
  app.get('/api/models/', (_req: Request, res: Response) => {
    res.json(getAllModels());
  });

  /**
   * GET /api/models/ellipsoids/:name
   * Get details for a specific ellipsoid
   */
  app.get('/api/models/ellipsoids/:name', (req: Request, res: Response) => {
    const { name } = req.params;
    const model = getEllipsoidModel(name);

    if (!model) {
      res.status(404).json({ error: `Model '${name}' not found` });
      return;
    }

    res.json(model);
  });

  // Error handling middleware
  app.use((err: Error, _req: Request, res: Response, _next: NextFunction) => {
    if (err instanceof SolarPositionError) {
      res.status(400).json({ error: err.message, code: err.code });
      return;
    }
    console.error('Error:', err.message);
    res.status(500).json({ error: err.message });
  });

  return app;
}
