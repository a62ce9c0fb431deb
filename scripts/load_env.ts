/**
 * Side-effect import: must come before any module that reads process.env.
 */

import dotenv from 'dotenv';
import { resolve } from 'path';

// .env.local wins over .env
dotenv.config({ path: resolve(process.cwd(), '.env.local') });
dotenv.config();
