/**
 * Loads .env.local first, then .env for anything still missing.
 * Imported before any module that reads the environment at load time.
 */

import dotenv from 'dotenv';
import { resolve } from 'path';

dotenv.config({ path: resolve(process.cwd(), '.env.local') });
dotenv.config();
