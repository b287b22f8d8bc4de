/**
 * Ways a caller can name the repository whose releases are checked.
 */
export type RepositoryLocator =
    | { kind: 'web-url'; url: string | URL }
    | { kind: 'owner-repo'; value: string }
    | { kind: 'git-remote'; url: string | URL };

export interface RepositoryPath {
    owner: string;
    repo: string;
}

/**
 * `latest` queries `/releases/latest` and decodes one object.
 * `collection` queries `/releases` and takes the first (newest) element.
 */
export type ReleaseEndpoint = 'latest' | 'collection';

export const DEFAULT_API_BASE_URL = 'https://api.github.com';

const GIT_SUFFIX = /\.git$/i;
const SCP_LIKE_REMOTE = /^[^@/\s]+@([^:/\s]+):(.+)$/;

export function webUrl(url: string | URL): RepositoryLocator {
    return { kind: 'web-url', url };
}

export function ownerRepo(value: string): RepositoryLocator {
    return { kind: 'owner-repo', value };
}

export function gitRemote(url: string | URL): RepositoryLocator {
    return { kind: 'git-remote', url };
}

/**
 * Resolves a locator to its owner/repo pair, or `null` when the input does not
 * name a repository.
 */
export function resolveRepositoryPath(locator: RepositoryLocator): RepositoryPath | null {
    switch (locator.kind) {
        case 'web-url':
            return resolveWebUrl(locator.url);
        case 'owner-repo':
            return resolveOwnerRepo(locator.value);
        case 'git-remote':
            return resolveGitRemote(locator.url);
    }
}

export function formatRepositoryPath(path: RepositoryPath): string {
    return `${path.owner}/${path.repo}`;
}

export function describeLocator(locator: RepositoryLocator): string {
    return locator.kind === 'owner-repo' ? locator.value : String(locator.url);
}

export function buildReleasesUrl(
    path: RepositoryPath,
    endpoint: ReleaseEndpoint,
    apiBaseUrl: string = DEFAULT_API_BASE_URL
): string {
    const base = apiBaseUrl.replace(/\/+$/, '');
    const repoPath = `${encodeURIComponent(path.owner)}/${encodeURIComponent(path.repo)}`;
    const suffix = endpoint === 'latest' ? '/releases/latest' : '/releases';
    return `${base}/repos/${repoPath}${suffix}`;
}

function resolveWebUrl(input: string | URL): RepositoryPath | null {
    const parsed = parseUrl(input);
    if (!parsed) {
        return null;
    }

    // Anything after owner/repo (tree/main, releases, ...) is ignored.
    const segments = parsed.pathname.split('/').filter((segment) => segment.length > 0);
    if (segments.length < 2) {
        return null;
    }

    return toRepositoryPath(decodeSegment(segments[0]), decodeSegment(segments[1]));
}

function resolveOwnerRepo(value: string): RepositoryPath | null {
    const segments = value.trim().split('/');
    if (segments.length !== 2) {
        return null;
    }

    return toRepositoryPath(segments[0], segments[1]);
}

function resolveGitRemote(input: string | URL): RepositoryPath | null {
    const remote = String(input).trim().replace(/\/+$/, '');

    const scpLike = remote.includes('://') ? null : SCP_LIKE_REMOTE.exec(remote);
    const pathPart = scpLike
        ? scpLike[2]
        : remote.split('/').slice(3).join('/');

    const segments = pathPart.replace(GIT_SUFFIX, '').split('/').filter((segment) => segment.length > 0);
    if (segments.length !== 2) {
        return null;
    }

    return toRepositoryPath(decodeSegment(segments[0]), decodeSegment(segments[1]));
}

function toRepositoryPath(owner: string | null, repo: string | null): RepositoryPath | null {
    if (owner === null || repo === null) {
        return null;
    }

    const normalizedOwner = owner.trim();
    const normalizedRepo = repo.trim().replace(GIT_SUFFIX, '');
    if (!isUsableSegment(normalizedOwner) || !isUsableSegment(normalizedRepo)) {
        return null;
    }

    return { owner: normalizedOwner, repo: normalizedRepo };
}

function isUsableSegment(segment: string): boolean {
    return segment.length > 0 && segment !== '.' && segment !== '..' && !/[\s/]/.test(segment);
}

function parseUrl(input: string | URL): URL | null {
    if (input instanceof URL) {
        return input;
    }

    try {
        return new URL(input.trim());
    } catch {
        return null;
    }
}

function decodeSegment(segment: string): string | null {
    try {
        return decodeURIComponent(segment);
    } catch {
        return null;
    }
}
