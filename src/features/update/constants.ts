/**
 * Constants for the update feature
 */

// HTTP Status Codes
export const HTTP_STATUS_SUCCESS_MIN = 200;
export const HTTP_STATUS_SUCCESS_MAX = 299;

// Request headers
export const GITHUB_ACCEPT_HEADER = 'application/vnd.github+json';
export const GITHUB_API_VERSION = '2022-11-28';
export const DEFAULT_USER_AGENT = 'release-update-check';

// Presentation (columns / lines)
export const DEFAULT_PRESENTATION_WIDTH = 80;
export const DEFAULT_PRESENTATION_HEIGHT = 12;
export const MINIMUM_PRESENTATION_WIDTH = 20;
export const MINIMUM_PRESENTATION_HEIGHT = 3;
