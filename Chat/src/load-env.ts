// Imported first by the entry point so LOG_LEVEL and keys from .env are
// visible before any module creates its logger.
import { loadEnvSafely } from '@pyloop/shared/Utils/env.js';

loadEnvSafely(import.meta.url);
