export const APP_NAME = 'mail-auth';
export const APP_VERSION = '0.1.0';

export const DEFAULT_API_BASE_URL = 'https://mail.protonmail.com/api';
export const DEFAULT_CLIENT_ID = 'Web';
export const DEFAULT_APP_VERSION_HEADER = `Other_${APP_NAME}@${APP_VERSION}`;

// Auth calls are small; anything slower than this is treated as a dead connection
export const DEFAULT_AUTH_TIMEOUT_MS = 15000;

// Successful API responses carry this in their `Code` field
export const API_SUCCESS_CODE = 1000;

export const REFRESH_REDIRECT_URI = 'https://protonmail.com';

export const ENV_PREFIX = 'MAIL_AUTH_';
