import { getCheckerConfiguration, normalizePresentationSize } from '../../configuration/settings';
import type { CheckerConfiguration, PresentationSize } from '../../configuration/settings';
import { logger as defaultLogger, type Logger } from '../../utils/logger';
import { hostApplicationVersion, type CurrentVersionSource } from './AppVersion';
import { CheckerError, describeError, toCheckerError } from './CheckerError';
import { GitHubReleaseProvider, type HttpClient } from './GitHubReleaseProvider';
import type { ReleaseProvider } from './ReleaseProvider';
import {
	describeLocator,
	formatRepositoryPath,
	resolveRepositoryPath,
	type RepositoryLocator
} from './RepositoryLocator';
import {
	checkFailed,
	updateAvailable,
	upToDate,
	type UpdateCheckCallback,
	type UpdateCheckResult
} from './UpdateCheckResult';
import { UpdateNotifier } from './UpdateNotifier';
import { immediateDispatcher, type Dispatcher, type PresenterFactory, type UpdatePresenter } from './UpdatePresenter';
import { compareMajorVersions, type ReleaseInfo, type VersionComparator } from './VersionChecker';

export interface UpdateCheckerOptions {
	/** Replaces the GitHub provider entirely; `httpClient` and request settings are then unused. */
	provider?: ReleaseProvider;
	httpClient?: HttpClient;
	/** Overrides on top of the environment configuration. */
	configuration?: Partial<CheckerConfiguration>;
	comparator?: VersionComparator;
	currentVersion?: CurrentVersionSource;
	presenterFactory?: PresenterFactory;
	/** Execution context for presenter calls. */
	dispatch?: Dispatcher;
	presentation?: Partial<PresentationSize>;
	logger?: Logger;
}

export interface CheckOptions {
	showUI?: boolean;
}

/**
 * Orchestrates one update check: current version, locator resolution, a single
 * release request, and the version policy.
 *
 * Calls are independent of each other: nothing is cached or de-duplicated.
 */
export class UpdateChecker {
	readonly presentation: PresentationSize;

	private readonly provider: ReleaseProvider;
	private readonly comparator: VersionComparator;
	private readonly currentVersion: CurrentVersionSource;
	private readonly presenterFactory: PresenterFactory;
	private readonly dispatch: Dispatcher;
	private readonly logger: Logger;

	constructor(options: UpdateCheckerOptions = {}) {
		const config: CheckerConfiguration = { ...getCheckerConfiguration(), ...options.configuration };

		this.logger = options.logger ?? defaultLogger;
		if (!options.logger && options.configuration?.logLevel) {
			defaultLogger.setLevel(options.configuration.logLevel);
		}
		this.presentation = normalizePresentationSize({ ...config.presentation, ...options.presentation });
		this.provider = options.provider ?? new GitHubReleaseProvider({
			apiBaseUrl: config.apiBaseUrl,
			endpoint: config.endpoint,
			token: config.token,
			userAgent: config.userAgent,
			timeoutMs: config.timeoutMs,
			httpClient: options.httpClient,
			logger: this.logger
		});
		this.comparator = options.comparator ?? compareMajorVersions;
		this.currentVersion = options.currentVersion ?? hostApplicationVersion();
		this.presenterFactory = options.presenterFactory ?? ((context) => UpdateNotifier.create(context));
		this.dispatch = options.dispatch ?? immediateDispatcher;
	}

	/**
	 * Runs a check and invokes `onResult` exactly once with the outcome.
	 *
	 * The callback runs on whatever context the request completed on; callers
	 * touching UI state from it must re-dispatch themselves.
	 */
	checkUpdate(locator: RepositoryLocator, showUI: boolean, onResult: UpdateCheckCallback): void {
		const deliver = this.once(onResult);

		void this.check(locator, { showUI }).then(
			(result) => deliver(result),
			(error: unknown) => deliver(checkFailed(toCheckerError(error)))
		);
	}

	/**
	 * Promise form of `checkUpdate`. Never rejects; failures are returned as
	 * results with status `error`.
	 */
	async check(locator: RepositoryLocator, options: CheckOptions = {}): Promise<UpdateCheckResult> {
		const currentVersion = this.readCurrentVersion();
		const session = options.showUI ? this.openPresenter(currentVersion) : null;

		session?.loadingStarted();
		try {
			const { result, release } = await this.run(locator, currentVersion);

			if (result.status === 'error') {
				session?.errorReceived(result.error);
			} else if (release) {
				session?.resultReceived(release, result.hasUpdate);
			}

			return result;
		} finally {
			session?.dispose();
		}
	}

	private async run(
		locator: RepositoryLocator,
		currentVersion: string | null
	): Promise<{ result: UpdateCheckResult; release: ReleaseInfo | null }> {
		if (currentVersion === null) {
			return this.fail(CheckerError.cantGetCurrentVersion());
		}

		const repository = resolveRepositoryPath(locator);
		if (!repository) {
			return this.fail(CheckerError.invalidInput(describeLocator(locator)));
		}

		const label = formatRepositoryPath(repository);
		this.logger.debug(`Checking releases of ${label} against ${currentVersion}`);

		let release: ReleaseInfo;
		try {
			release = await this.provider.fetchLatestRelease(repository);
		} catch (error) {
			return this.fail(toCheckerError(error));
		}

		let hasUpdate: boolean;
		try {
			hasUpdate = this.comparator(currentVersion, release);
		} catch (error) {
			return this.fail(CheckerError.comparison(error));
		}

		this.logger.info(hasUpdate
			? `${label} ${release.tagName} is available (current: ${currentVersion})`
			: `${label} is up to date (current: ${currentVersion}, latest: ${release.tagName})`);

		return {
			result: hasUpdate ? updateAvailable(release) : upToDate(),
			release
		};
	}

	private fail(error: CheckerError): { result: UpdateCheckResult; release: null } {
		this.logger.debug(`Update check failed (${error.kind}): ${error.message}`);
		return { result: checkFailed(error), release: null };
	}

	private readCurrentVersion(): string | null {
		try {
			const version = this.currentVersion();
			return version && version.trim() ? version.trim() : null;
		} catch (error) {
			this.logger.warn(`Could not read current version: ${describeError(error)}`);
			return null;
		}
	}

	private openPresenter(currentVersion: string | null): DispatchedPresenter | null {
		try {
			const presenter = this.presenterFactory({ currentVersion, size: this.presentation });
			return new DispatchedPresenter(presenter, this.dispatch, this.logger);
		} catch (error) {
			this.logger.error(`Could not open update presenter: ${describeError(error)}`);
			return null;
		}
	}

	private once(onResult: UpdateCheckCallback): UpdateCheckCallback {
		let delivered = false;
		return (result) => {
			if (delivered) {
				return;
			}
			delivered = true;
			try {
				onResult(result);
			} catch (error) {
				this.logger.error(`Update check callback threw: ${describeError(error)}`);
			}
		};
	}
}

/**
 * Forwards presenter transitions through the UI dispatcher, in order.
 */
class DispatchedPresenter implements UpdatePresenter {
	constructor(
		private readonly target: UpdatePresenter,
		private readonly dispatch: Dispatcher,
		private readonly logger: Logger
	) { }

	loadingStarted(): void {
		this.post('loadingStarted', () => this.target.loadingStarted());
	}

	resultReceived(release: ReleaseInfo, hasUpdate: boolean): void {
		this.post('resultReceived', () => this.target.resultReceived(release, hasUpdate));
	}

	errorReceived(error: CheckerError): void {
		this.post('errorReceived', () => this.target.errorReceived(error));
	}

	dispose(): void {
		this.post('dispose', () => this.target.dispose?.());
	}

	private post(name: string, task: () => void): void {
		const run = (): void => {
			try {
				task();
			} catch (error) {
				this.logger.error(`Update presenter ${name} failed: ${describeError(error)}`);
			}
		};

		try {
			this.dispatch(run);
		} catch (error) {
			this.logger.error(`Could not dispatch update presenter ${name}: ${describeError(error)}`);
		}
	}
}
