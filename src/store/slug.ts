/**
 * Slug helpers for store paths and repository sources.
 */

import { basename, resolve } from 'node:path';

const SHORT_REPO_PATTERN = /^[A-Za-z0-9._-]+\/[A-Za-z0-9._-]+$/;
const UNSAFE_PATTERN = /[^A-Za-z0-9._-]+/g;

const GITHUB_HTTPS = 'https://github.com/';
const GITHUB_HTTP = 'http://github.com/';
const GITHUB_SSH = 'git@github.com:';

/**
 * Make a value safe for use as a single path segment.
 * Returns 'unknown' for values with nothing usable left, including
 * the relative segments `.` and `..`.
 */
export function safeSlug(value: string): string {
  const slug = value.replace(UNSAFE_PATTERN, '_').replace(/^_+|_+$/g, '');
  return slug && !/^\.+$/.test(slug) ? slug : 'unknown';
}

/**
 * Whether a source names a GitHub repository (URL, SSH or owner/repo).
 */
export function isGitHubRepo(source: string): boolean {
  return (
    source.startsWith(GITHUB_HTTPS) ||
    source.startsWith(GITHUB_HTTP) ||
    source.startsWith(GITHUB_SSH) ||
    SHORT_REPO_PATTERN.test(source)
  );
}

/**
 * Normalise any GitHub source form to an https URL.
 */
export function normalizeGitHubRepo(source: string): string {
  if (source.startsWith(GITHUB_SSH)) {
    return GITHUB_HTTPS + source.slice(GITHUB_SSH.length);
  }
  if (source.startsWith(GITHUB_HTTP)) {
    return GITHUB_HTTPS + source.slice(GITHUB_HTTP.length);
  }
  if (SHORT_REPO_PATTERN.test(source)) {
    return GITHUB_HTTPS + source;
  }
  return source;
}

/**
 * Derive the store directory name for a repository source.
 *
 * @example
 * repoSlugFromSource('git@github.com:acme/cache.git') // 'acme_cache'
 * repoSlugFromSource('/src/work/cache')               // 'cache'
 * repoSlugFromSource('.')                             // name of the working directory
 */
export function repoSlugFromSource(source: string): string {
  if (isGitHubRepo(source)) {
    const path = normalizeGitHubRepo(source)
      .slice(GITHUB_HTTPS.length)
      .replace(/\/+$/, '')
      .replace(/\.git$/, '');
    return path.split('/').join('_');
  }
  return safeSlug(basename(resolve(source)));
}
