/**
 * Store Module
 *
 * Markdown document store for API items, plus slug helpers.
 */

export {
  DocStore,
  renderMarkdown,
  formatTimestamp,
  type GeneratedDoc,
  type DocStoreOptions,
  type IndexFile,
  type IndexItem,
} from './doc-store.js';

export {
  safeSlug,
  isGitHubRepo,
  normalizeGitHubRepo,
  repoSlugFromSource,
} from './slug.js';
