/**
 * Shared constants for projections.
 */

/** Cashflow horizon (years) used when neither the request nor the plan sets one. */
export const DEFAULT_HORIZON_YEARS = 30;

/** Longest horizon (years) the API and plan documents accept. */
export const MAX_HORIZON_YEARS = 150;

/** Default retirement age for a person without one. */
export const DEFAULT_RETIREMENT_AGE = 65;

/** Default age at which social security starts. */
export const DEFAULT_SOCIAL_SECURITY_START = 67;

/** Default port for the HTTP API. */
export const DEFAULT_PORT = 3000;
