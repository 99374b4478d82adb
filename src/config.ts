// Rendering
export const TAB_STOP = 2;

// Embedded file expansion
export const MAX_EMBED_DEPTH = 32;

// Feed service authentication
export const DEFAULT_AUTHN_PROTOCOL = 'http';
export const CLIENT_SOURCE = 'feedtool-1.0';
export const CLIENT_LOGIN_PATH = '/accounts/ClientLogin';
export const CLIENT_LOGIN_ACCOUNT_TYPE = 'HOSTED_OR_GOOGLE';

// Environment variables consulted when the matching flag is absent
export const AUTHN_URL_ENV_VAR = 'FEED_AUTHN_URL';
export const AUTHN_PROTOCOL_ENV_VAR = 'FEED_AUTHN_PROTOCOL';
export const AUTHN_SERVICE_ENV_VAR = 'FEED_AUTHN_SERVICE';
export const USERNAME_ENV_VAR = 'FEED_USERNAME';
export const PASSWORD_ENV_VAR = 'FEED_PASSWORD';
