import type { CheckerError } from './CheckerError';
import type { ReleaseInfo } from './VersionChecker';

/**
 * Status of an update check operation.
 */
export type UpdateCheckStatus =
	| 'update-available'  // Comparator reported the latest release as newer
	| 'up-to-date'        // A release was found but is not newer
	| 'error';            // The check failed; see `error.kind`

export interface UpdateAvailableResult {
	status: 'update-available';
	newVersion: ReleaseInfo;
	hasUpdate: true;
}

export interface UpToDateResult {
	status: 'up-to-date';
	newVersion: null;
	hasUpdate: false;
}

export interface FailedCheckResult {
	status: 'error';
	error: CheckerError;
}

/**
 * Result of an update check operation. `hasUpdate` is true exactly when
 * `newVersion` is set.
 */
export type UpdateCheckResult = UpdateAvailableResult | UpToDateResult | FailedCheckResult;

export type UpdateCheckCallback = (result: UpdateCheckResult) => void;

export function updateAvailable(release: ReleaseInfo): UpdateAvailableResult {
	return { status: 'update-available', newVersion: release, hasUpdate: true };
}

export function upToDate(): UpToDateResult {
	return { status: 'up-to-date', newVersion: null, hasUpdate: false };
}

export function checkFailed(error: CheckerError): FailedCheckResult {
	return { status: 'error', error };
}

export function isSuccessfulCheck(result: UpdateCheckResult): result is UpdateAvailableResult | UpToDateResult {
	return result.status !== 'error';
}
