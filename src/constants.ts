export const SDK_VERSION = '0.1.0';

export const API_BASE_PATH = '/api/2.0/genie';

export const DEFAULT_TIMEOUT = 30000;

export const DEFAULT_USER_AGENT = `genie-spaces-ts/${SDK_VERSION}`;

export const DEFAULT_LOG_LEVEL = 'warn';
