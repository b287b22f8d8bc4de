import type { RepositoryPath } from './RepositoryLocator';
import type { ReleaseInfo } from './VersionChecker';

/**
 * Abstraction for fetching the latest release of a repository.
 *
 * Implementations perform at most one request per call and reject only with
 * a `CheckerError`; UpdateChecker still wraps anything else as a network error.
 */
export interface ReleaseProvider {
	/**
	 * Fetches the latest release of `repository`.
	 *
	 * @throws CheckerError on transport, status or decode failures.
	 */
	fetchLatestRelease(repository: RepositoryPath): Promise<ReleaseInfo>;
}
