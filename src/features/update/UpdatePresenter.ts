import type { CheckerError } from './CheckerError';
import type { PresentationSize } from '../../configuration/settings';
import type { ReleaseInfo } from './VersionChecker';

/**
 * Receives the state transitions of one update check so a UI can render them.
 * The checker makes no assumption about how they are drawn.
 */
export interface UpdatePresenter {
	loadingStarted(): void;
	/**
	 * @param release the latest release, also when it is not newer
	 */
	resultReceived(release: ReleaseInfo, hasUpdate: boolean): void;
	errorReceived(error: CheckerError): void;
	/** Called once after the final transition. */
	dispose?(): void;
}

export interface PresenterContext {
	currentVersion: string | null;
	size: PresentationSize;
}

/**
 * Creates the presenter for one check. Called only when the caller asked for UI.
 */
export type PresenterFactory = (context: PresenterContext) => UpdatePresenter;

/**
 * Runs a task on the execution context that owns the UI.
 */
export type Dispatcher = (task: () => void) => void;

export const immediateDispatcher: Dispatcher = (task) => {
	setImmediate(task);
};
