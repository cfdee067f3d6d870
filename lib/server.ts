/**
 * Sub-Solar Point REST API Server
 */

import { execSync } from 'child_process';
import crypto from 'crypto';
import { createApp } from './app.js';
import { DEFAULT_ELLIPSOID, isEllipsoidName } from './ellipsoids.js';

// Server identification
const SERVER_ID = crypto.randomBytes(4).toString('hex');
let GIT_HASH = process.env.GIT_COMMIT || '-';

// Try to get git hash if not provided
if (GIT_HASH === '-') {
  try {
    GIT_HASH = execSync('git rev-parse --short HEAD', {
      encoding: 'utf8',
      stdio: ['ignore', 'pipe', 'ignore'],
    }).trim();
  } catch {
    GIT_HASH = '-';
  }
}

const DEFAULT_MODEL = process.env.SOLAR_DEFAULT_MODEL || DEFAULT_ELLIPSOID;

if (!isEllipsoidName(DEFAULT_MODEL)) {
  console.error(`Unknown SOLAR_DEFAULT_MODEL: ${DEFAULT_MODEL}`);
  process.exit(1);
}

const PORT = Number(process.env.PORT) || 3000;

const app = createApp({ defaultModel: DEFAULT_MODEL, gitHash: GIT_HASH, serverId: SERVER_ID });

app.listen(PORT, () => {
  console.log(`=== Sub-Solar Point REST API Server ===`);
  console.log(`Serving on http://0.0.0.0:${PORT}`);
  console.log(``);
  console.log(`Git commit:    ${GIT_HASH}`);
  console.log(`Server ID:     ${SERVER_ID}`);
  console.log(`Default model: ${DEFAULT_MODEL}`);
  console.log(``);
  console.log(`API Documentation: http://localhost:${PORT}/api/docs`);
  console.log(`OpenAPI Spec:      http://localhost:${PORT}/api/openapi.json`);
  console.log(``);
  console.log(`Endpoints:`);
  console.log(`  GET  /api/sun/point                - Sub-solar fix at an instant`);
  console.log(`  GET  /api/sun/bearing              - Bearing from a station to the sub-solar point`);
  console.log(`  GET  /api/sun/track                - Sub-solar ground track over a range`);
  console.log(`  GET  /api/sun/health               - Health check`);
  console.log(`  GET  /api/models/                  - List ellipsoids`);
  console.log(`  GET  /api/models/ellipsoids/:name  - Get ellipsoid details`);
  console.log(``);
  console.log(`Press Ctrl+C to stop the server`);
});

export default app;
