/**
 * VersionChecker handles release response shaping plus the version policies
 * used to decide whether a release counts as an update.
 *
 * Network fetching is not part of this module; callers pass decoded JSON in.
 */
import { CheckerError } from './CheckerError';
import type { ReleaseEndpoint } from './RepositoryLocator';

/**
 * A release object as returned by the GitHub releases API. Only the fields the
 * checker reads are listed.
 */
export interface GitHubReleaseResponse {
    tag_name: string;
    name?: string | null;
    body?: string | null;
    html_url: string;
}

export interface ReleaseInfo {
    readonly tagName: string;
    readonly name: string | null;
    /** Markdown release notes. */
    readonly notes: string | null;
    /** Web page of the release. */
    readonly downloadUrl: string;
}

/**
 * Decides whether `latestRelease` should be reported as an update for
 * `currentVersion`. Must be pure and synchronous.
 */
export type VersionComparator = (currentVersion: string, latestRelease: ReleaseInfo) => boolean;

type SemanticVersion = [number, number, number];

export class VersionChecker {
    /**
     * Numeric major.minor.patch comparison. Missing minor/patch count as 0 and
     * a leading `v` is ignored. Returns 0 when either side cannot be parsed.
     */
    compareVersions(a: string, b: string): number {
        const aParts = this.parseVersion(a);
        const bParts = this.parseVersion(b);

        if (!aParts || !bParts) {
            return 0;
        }

        for (let index = 0; index < 3; index += 1) {
            if (aParts[index] > bParts[index]) return 1;
            if (aParts[index] < bParts[index]) return -1;
        }

        return 0;
    }

    isValidVersion(version: string): boolean {
        const normalized = version.toLowerCase().trim();
        if (['local', 'unknown', ''].includes(normalized)) {
            return false;
        }

        return this.parseVersion(version) !== null;
    }

    /**
     * Signed integer before the first `.`; anything else counts as 0.
     */
    leadingMajor(version: string): number {
        const [head = ''] = version.split('.');
        const trimmed = head.trim();
        return /^[+-]?\d+$/.test(trimmed) ? Number.parseInt(trimmed, 10) : 0;
    }

    buildReleaseInfo(releaseData: unknown): ReleaseInfo {
        if (!isRecord(releaseData)) {
            throw CheckerError.decode('expected a release object');
        }

        const tagName = releaseData['tag_name'];
        if (typeof tagName !== 'string' || tagName.length === 0) {
            throw CheckerError.decode('missing required field "tag_name"');
        }

        const htmlUrl = releaseData['html_url'];
        if (typeof htmlUrl !== 'string' || htmlUrl.length === 0) {
            throw CheckerError.decode('missing required field "html_url"');
        }

        return Object.freeze({
            tagName,
            name: optionalText(releaseData, 'name'),
            notes: optionalText(releaseData, 'body'),
            downloadUrl: htmlUrl
        });
    }

    /**
     * Picks the latest release out of a decoded response body.
     *
     * @param repository used only in the `no-releases` message
     */
    selectLatestRelease(json: unknown, endpoint: ReleaseEndpoint, repository: string): ReleaseInfo {
        if (endpoint === 'latest') {
            if (Array.isArray(json)) {
                throw CheckerError.decode('expected a release object, got an array');
            }
            return this.buildReleaseInfo(json);
        }

        if (!Array.isArray(json)) {
            throw CheckerError.decode('expected an array of releases');
        }

        if (json.length === 0) {
            throw CheckerError.noReleases(repository);
        }

        const [latest] = json.map((item) => this.buildReleaseInfo(item));
        return latest;
    }

    private normalizeVersion(version: string): string {
        const trimmed = version.trim();
        return trimmed.startsWith('v') || trimmed.startsWith('V') ? trimmed.substring(1) : trimmed;
    }

    private parseVersion(version: string): SemanticVersion | null {
        const normalized = this.normalizeVersion(version);
        const match = /^(\d+)(?:\.(\d+))?(?:\.(\d+))?/.exec(normalized);
        if (!match) {
            return null;
        }

        return [
            Number.parseInt(match[1], 10),
            Number.parseInt(match[2] ?? '0', 10),
            Number.parseInt(match[3] ?? '0', 10)
        ];
    }
}

const sharedChecker = new VersionChecker();

export function leadingMajorVersion(version: string): number {
    return sharedChecker.leadingMajor(version);
}

/**
 * Default policy: only the leading major number is compared, so 2.0.0 -> 2.5.0
 * is not reported while 2.0.0 -> 3.1.0 is.
 */
export const compareMajorVersions: VersionComparator = (currentVersion, latestRelease) =>
    leadingMajorVersion(latestRelease.tagName) > leadingMajorVersion(currentVersion);

/**
 * Stricter opt-in policy comparing major, minor and patch.
 */
export const compareSemanticVersions: VersionComparator = (currentVersion, latestRelease) =>
    sharedChecker.isValidVersion(currentVersion) &&
    sharedChecker.compareVersions(latestRelease.tagName, currentVersion) > 0;

function isRecord(value: unknown): value is Record<string, unknown> {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function optionalText(record: Record<string, unknown>, field: keyof GitHubReleaseResponse): string | null {
    const value = record[field];
    if (value === undefined || value === null) {
        return null;
    }
    if (typeof value !== 'string') {
        throw CheckerError.decode(`field "${field}" must be a string or null`);
    }
    return value;
}
