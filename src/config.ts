/**
 * Runtime configuration for the repository search client.
 * Only the API base URL can be overridden (VITE_GITHUB_API_URL).
 */

export const API_BASE = import.meta.env.VITE_GITHUB_API_URL || 'https://api.github.com';

export const SEARCH_PATH = '/search/repositories';

/** Placeholder language for repositories the API reports no language for. */
export const NO_LANGUAGE = 'NO LANGUAGE';

export const LANGUAGE_CATEGORY = 'language';

// The API never returns more than 100 items per page.
export const MAX_RENDERED_RESULTS = 100;
