/**
 * Loaded before anything else so the shared logger sees these values
 */

import { config as dotenvConfig } from 'dotenv';

dotenvConfig();

// Pipeline logs stay below the spinner unless asked for
process.env['LOG_LEVEL'] ??= 'warn';
process.env['NODE_ENV'] ??= 'production';
