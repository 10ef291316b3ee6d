// src/config/env.ts
// What: Process configuration singleton.
// How: Loads .env via dotenv, then validates process.env once at import. Throws on invalid configuration so the
//      server and scripts fail before doing any work.

import 'dotenv/config';
import { parseAppConfig, type AppConfig } from './appConfig.js';

const config: AppConfig = parseAppConfig(process.env);

export type { AppConfig };
export default config;
