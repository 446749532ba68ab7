import dotenv from 'dotenv';

dotenv.config();

function optionalInt(value: string | undefined): number | undefined {
  if (!value) return undefined;
  const parsed = parseInt(value, 10);
  return isNaN(parsed) ? undefined : parsed;
}

export const env = {
  // Output
  DATA_DIR: process.env.DATA_DIR || 'data',

  // Listing source ({id} is replaced with the project id)
  LISTING_URL_TEMPLATE:
    process.env.LISTING_URL_TEMPLATE ||
    'https://abstracts.societyforscience.org/Home/FullAbstract?projectId={id}',
  LISTING_START_ID: parseInt(process.env.LISTING_START_ID || '1', 10),
  LISTING_END_ID: parseInt(process.env.LISTING_END_ID || '30000', 10), // covers 2014 onwards

  // Search endpoint ({query} is replaced with the url-encoded query)
  SEARCH_URL_TEMPLATE: process.env.SEARCH_URL_TEMPLATE || 'https://html.duckduckgo.com/html/?q={query}',

  // HTTP
  USER_AGENT:
    process.env.USER_AGENT ||
    'Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/120.0.0.0 Safari/537.36',
  REQUEST_DELAY_MS: parseInt(process.env.REQUEST_DELAY_MS || '3000', 10),
  HTTP_TIMEOUT: parseInt(process.env.HTTP_TIMEOUT || '30000', 10),

  // Resilience
  MAX_RETRIES: parseInt(process.env.MAX_RETRIES || '2', 10),
  RETRY_BACKOFF_BASE: parseInt(process.env.RETRY_BACKOFF_BASE || '1000', 10),
  BLOCK_THRESHOLD: parseInt(process.env.BLOCK_THRESHOLD || '3', 10), // consecutive block responses before stopping

  // Progress
  BATCH_SIZE: parseInt(process.env.BATCH_SIZE || '10', 10),

  // Contact search
  EMAIL_MIN_YEAR: optionalInt(process.env.EMAIL_MIN_YEAR), // unset: every year
  EMAIL_QUERY_LIMIT: parseInt(process.env.EMAIL_QUERY_LIMIT || '3', 10),
  EMAIL_GUESSING_ENABLED: process.env.EMAIL_GUESSING_ENABLED === 'true', // Default false
  COMPETITION_NAME: process.env.COMPETITION_NAME || 'ISEF',
} as const;

export default env;
