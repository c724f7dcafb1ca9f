#!/usr/bin/env node
import { loadEnvOnce } from './env/index.js';

// The logger reads LOG_* at import time, so .env goes first.
loadEnvOnce();

const { main } = await import('./app.js');
await main();
