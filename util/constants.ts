// =============================================================================
// Constants - Shared Magic Values
// =============================================================================

export const CLI_NAME = "hk";

export const CLI_VERSION = "0.3.0";

// =============================================================================
// Platform API
// =============================================================================

export const DEFAULT_API_URL = "https://api.heroku.com";

export const API_ACCEPT = "application/vnd.heroku+json; version=3";

// =============================================================================
// Environment Variables
// =============================================================================

export const ENV_API_URL = "HEROKU_API_URL";

export const ENV_API_KEY = "HEROKU_API_KEY";

export const ENV_APP = "HKAPP";

export const ENV_DEBUG = "HKDEBUG";

// =============================================================================
// Git
// =============================================================================

export const GIT_REMOTE = "heroku";
