/**
 * Loads `.env` into process.env.
 *
 * Import this first in an entry point so every later module sees the
 * variables.
 */
import dotenv from 'dotenv';

dotenv.config();
