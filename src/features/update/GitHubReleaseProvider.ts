import { logger, type Logger } from '../../utils/logger';
import { CheckerError, toCheckerError } from './CheckerError';
import {
    DEFAULT_USER_AGENT,
    GITHUB_ACCEPT_HEADER,
    GITHUB_API_VERSION,
    HTTP_STATUS_SUCCESS_MAX,
    HTTP_STATUS_SUCCESS_MIN
} from './constants';
import type { ReleaseProvider } from './ReleaseProvider';
import {
    DEFAULT_API_BASE_URL,
    buildReleasesUrl,
    formatRepositoryPath,
    type ReleaseEndpoint,
    type RepositoryPath
} from './RepositoryLocator';
import { VersionChecker, type ReleaseInfo } from './VersionChecker';

/**
 * The subset of `fetch` the provider needs. Any client with this shape can be
 * injected and shared between providers.
 */
export type HttpClient = (url: string, init: RequestInit) => Promise<Response>;

export interface GitHubReleaseProviderOptions {
    apiBaseUrl?: string;
    endpoint?: ReleaseEndpoint;
    token?: string | null;
    userAgent?: string;
    timeoutMs?: number | null;
    httpClient?: HttpClient;
    versionChecker?: VersionChecker;
    logger?: Logger;
}

/**
 * Production implementation of ReleaseProvider that fetches from the GitHub API.
 * Every call issues exactly one GET.
 */
export class GitHubReleaseProvider implements ReleaseProvider {
    readonly endpoint: ReleaseEndpoint;

    private readonly apiBaseUrl: string;
    private readonly token: string | null;
    private readonly userAgent: string;
    private readonly timeoutMs: number | null;
    private readonly httpClient: HttpClient | null;
    private readonly versionChecker: VersionChecker;
    private readonly logger: Logger;

    constructor(options: GitHubReleaseProviderOptions = {}) {
        this.apiBaseUrl = options.apiBaseUrl ?? DEFAULT_API_BASE_URL;
        this.endpoint = options.endpoint ?? 'collection';
        this.token = options.token ?? null;
        this.userAgent = options.userAgent ?? DEFAULT_USER_AGENT;
        this.timeoutMs = options.timeoutMs ?? null;
        this.httpClient = options.httpClient ?? null;
        this.versionChecker = options.versionChecker ?? new VersionChecker();
        this.logger = options.logger ?? logger;
    }

    async fetchLatestRelease(repository: RepositoryPath): Promise<ReleaseInfo> {
        const url = buildReleasesUrl(repository, this.endpoint, this.apiBaseUrl);
        const label = formatRepositoryPath(repository);

        const controller = this.timeoutMs !== null ? new AbortController() : null;
        const timeoutId = controller ? setTimeout(() => controller.abort(), this.timeoutMs ?? 0) : null;

        this.logger.debug(`GET ${url}`);

        try {
            const response = await this.send(url, controller?.signal);

            if (response.status < HTTP_STATUS_SUCCESS_MIN || response.status > HTTP_STATUS_SUCCESS_MAX) {
                throw CheckerError.invalidResponse(
                    `HTTP ${response.status}${response.statusText ? ` ${response.statusText}` : ''}`,
                    response.status
                );
            }

            const text = await this.readBody(response);
            if (text.trim().length === 0) {
                throw CheckerError.invalidResponse('empty body', response.status);
            }

            return this.versionChecker.selectLatestRelease(parseJson(text), this.endpoint, label);
        } catch (error) {
            const checkerError = toCheckerError(error);
            this.logger.warn(`Release check for ${label} failed: ${checkerError.message}`);
            throw checkerError;
        } finally {
            if (timeoutId) {
                clearTimeout(timeoutId);
            }
        }
    }

    private buildHeaders(): Record<string, string> {
        const headers: Record<string, string> = {
            Accept: GITHUB_ACCEPT_HEADER,
            'User-Agent': this.userAgent,
            'X-GitHub-Api-Version': GITHUB_API_VERSION
        };
        if (this.token) {
            headers['Authorization'] = `Bearer ${this.token}`;
        }
        return headers;
    }

    private async send(url: string, signal: AbortSignal | undefined): Promise<Response> {
        // global fetch is read at call time
        const client: HttpClient = this.httpClient ?? fetch;
        try {
            return await client(url, { method: 'GET', headers: this.buildHeaders(), signal });
        } catch (error) {
            if (error instanceof Error && error.name === 'AbortError') {
                throw CheckerError.network(new Error(`Request timed out after ${this.timeoutMs}ms`));
            }
            throw CheckerError.network(error);
        }
    }

    private async readBody(response: Response): Promise<string> {
        if (response.body === null) {
            throw CheckerError.invalidResponse('missing body', response.status);
        }
        try {
            return await response.text();
        } catch (error) {
            throw CheckerError.network(error);
        }
    }
}

function parseJson(text: string): unknown {
    try {
        return JSON.parse(text);
    } catch (error) {
        throw CheckerError.decode('response body is not valid JSON', error);
    }
}
