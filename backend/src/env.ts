/**
 * Environment Configuration Loader
 * This file MUST be imported first in index.ts to ensure environment variables are loaded
 * before any other modules that depend on process.env
 */

import dotenv from 'dotenv';

// Load .env file from the working directory
dotenv.config();
