export { UpdateChecker } from './UpdateChecker';
export type { UpdateCheckerOptions, CheckOptions } from './UpdateChecker';
export { CheckerError, isCheckerError } from './CheckerError';
export type { CheckerErrorKind } from './CheckerError';
export {
    VersionChecker,
    compareMajorVersions,
    compareSemanticVersions,
    leadingMajorVersion
} from './VersionChecker';
export type { ReleaseInfo, VersionComparator, GitHubReleaseResponse } from './VersionChecker';
export {
    webUrl,
    ownerRepo,
    gitRemote,
    resolveRepositoryPath,
    formatRepositoryPath,
    buildReleasesUrl,
    DEFAULT_API_BASE_URL
} from './RepositoryLocator';
export type { RepositoryLocator, RepositoryPath, ReleaseEndpoint } from './RepositoryLocator';
export { GitHubReleaseProvider } from './GitHubReleaseProvider';
export type { HttpClient, GitHubReleaseProviderOptions } from './GitHubReleaseProvider';
export type { ReleaseProvider } from './ReleaseProvider';
export type {
    UpdateCheckResult,
    UpdateCheckStatus,
    UpdateCheckCallback,
    UpdateAvailableResult,
    UpToDateResult,
    FailedCheckResult
} from './UpdateCheckResult';
export { isSuccessfulCheck } from './UpdateCheckResult';
export { UpdateNotifier } from './UpdateNotifier';
export { immediateDispatcher } from './UpdatePresenter';
export type { UpdatePresenter, PresenterFactory, PresenterContext, Dispatcher } from './UpdatePresenter';
export { hostApplicationVersion, packageVersion, readPackageVersion, staticVersion } from './AppVersion';
export type { CurrentVersionSource } from './AppVersion';
export { resolveGitRemoteLocator } from './GitRemoteResolver';
