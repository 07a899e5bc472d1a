/**
 * @module @pagesmith/deploy-api
 * Deployment service entry point
 */

import { bootstrap } from './bootstrap.js';

bootstrap().catch((error: unknown) => {
  console.error('Failed to start server:', error);
  process.exit(1);
});
