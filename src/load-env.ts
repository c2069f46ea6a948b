/**
 * Environment loading
 *
 * Imported first by the entry point so BOUNDARY_EXTRACTOR_* variables from a
 * .env file are set before any module reads them at load time.
 *
 * Candidate locations (first found wins):
 * 1. BOUNDARY_EXTRACTOR_ENV_FILE (explicit override)
 * 2. CWD/.env (project-local)
 * 3. Package root/.env (development)
 *
 * @module load-env
 */

import dotenv from 'dotenv';
import path from 'path';
import fs from 'fs';
import { fileURLToPath } from 'url';

const __dirname = path.dirname(fileURLToPath(import.meta.url));
const envCandidates = [
  process.env.BOUNDARY_EXTRACTOR_ENV_FILE,
  path.resolve(process.cwd(), '.env'),
  path.resolve(__dirname, '..', '.env'),
].filter((p): p is string => typeof p === 'string');

for (const envPath of envCandidates) {
  if (fs.existsSync(envPath)) {
    dotenv.config({ path: envPath, quiet: true });
    break;
  }
}
