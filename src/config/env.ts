import fs from 'node:fs';
import path from 'node:path';
import dotenv from 'dotenv';
import { loadEnv } from './loadEnv.js';

const cwdEnvPath = path.resolve(process.cwd(), '.env');
const parentEnvPath = path.resolve(process.cwd(), '..', '.env');

dotenv.config({ path: cwdEnvPath });
if (parentEnvPath !== cwdEnvPath && fs.existsSync(parentEnvPath)) {
  dotenv.config({ path: parentEnvPath, override: false });
}

export const env = loadEnv(process.env);
