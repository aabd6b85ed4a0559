import { config } from 'dotenv';
import { resolve } from 'path';

// Load .env file for tests
config({ path: resolve(process.cwd(), '.env') });

// Tests always run against the in-memory store, quietly
process.env['NODE_ENV'] = 'test';
process.env['STORE_DRIVER'] = 'memory';
process.env['LOG_LEVEL'] ??= 'silent';
