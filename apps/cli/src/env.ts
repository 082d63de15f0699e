/**
 * Environment bootstrap. Imported first so .env values are visible to the
 * shared logger when it is created.
 */

import { config as dotenvConfig } from 'dotenv';
import { resolve } from 'node:path';

dotenvConfig({ path: resolve(process.cwd(), '.env') });

// The terminal belongs to the spinner and summary; logs go to the work dir
process.env['LOG_FILE'] ??= resolve(process.env['VIDSHIFT_WORK_DIR'] ?? './temp', 'log.txt');
