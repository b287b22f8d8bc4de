import * as sinon from 'sinon';
import { assert } from 'chai';
import { CheckerError } from '../../../../src/features/update/CheckerError';
import { GitHubReleaseProvider } from '../../../../src/features/update/GitHubReleaseProvider';
import type { HttpClient } from '../../../../src/features/update/GitHubReleaseProvider';
import { VersionChecker } from '../../../../src/features/update/VersionChecker';
import { createLoggerStub, jsonResponse, sampleReleaseJson } from './testUtils';

const widget = { owner: 'octo', repo: 'widget' };

async function captureRejection(promise: Promise<unknown>): Promise<CheckerError> {
    try {
        await promise;
    } catch (error) {
        if (error instanceof CheckerError) {
            return error;
        }
        throw error;
    }
    throw new Error('Expected the promise to reject');
}

describe('GitHubReleaseProvider', () => {
    let httpStub: sinon.SinonStub<[string, RequestInit], Promise<Response>>;

    beforeEach(() => {
        httpStub = sinon.stub<[string, RequestInit], Promise<Response>>();
    });

    afterEach(() => {
        sinon.restore();
    });

    function createProvider(options: ConstructorParameters<typeof GitHubReleaseProvider>[0] = {}): GitHubReleaseProvider {
        return new GitHubReleaseProvider({
            httpClient: httpStub,
            userAgent: 'test-agent',
            logger: createLoggerStub(),
            ...options
        });
    }

    describe('fetchLatestRelease', () => {
        it('returns the first release of the collection endpoint', async () => {
            httpStub.resolves(jsonResponse([sampleReleaseJson('v3.1.0'), sampleReleaseJson('v3.0.0')]));

            const release = await createProvider().fetchLatestRelease(widget);

            assert.deepEqual(release, {
                tagName: 'v3.1.0',
                name: 'Widget v3.1.0',
                notes: 'Changes in v3.1.0',
                downloadUrl: 'https://github.com/octo/widget/releases/tag/v3.1.0'
            });
        });

        it('decodes a single object from the latest endpoint', async () => {
            httpStub.resolves(jsonResponse(sampleReleaseJson('2.0.0')));

            const release = await createProvider({ endpoint: 'latest' }).fetchLatestRelease(widget);

            assert.strictEqual(release.tagName, '2.0.0');
        });

        it('issues exactly one GET to the collection URL', async () => {
            httpStub.resolves(jsonResponse([sampleReleaseJson()]));

            await createProvider({ apiBaseUrl: 'https://api.example.test/' }).fetchLatestRelease(widget);

            assert.strictEqual(httpStub.callCount, 1);
            assert.strictEqual(httpStub.firstCall.args[0], 'https://api.example.test/repos/octo/widget/releases');
            assert.strictEqual(httpStub.firstCall.args[1].method, 'GET');
        });

        it('queries /releases/latest for the latest endpoint', async () => {
            httpStub.resolves(jsonResponse(sampleReleaseJson()));

            await createProvider({ apiBaseUrl: 'https://api.example.test', endpoint: 'latest' }).fetchLatestRelease(widget);

            assert.strictEqual(httpStub.firstCall.args[0], 'https://api.example.test/repos/octo/widget/releases/latest');
        });

        it('sends GitHub headers without a token by default', async () => {
            httpStub.resolves(jsonResponse([sampleReleaseJson()]));

            await createProvider().fetchLatestRelease(widget);

            assert.deepEqual(httpStub.firstCall.args[1].headers, {
                Accept: 'application/vnd.github+json',
                'User-Agent': 'test-agent',
                'X-GitHub-Api-Version': '2022-11-28'
            });
        });

        it('adds a bearer token when configured', async () => {
            httpStub.resolves(jsonResponse([sampleReleaseJson()]));

            await createProvider({ token: 'test-token' }).fetchLatestRelease(widget);

            assert.deepEqual(httpStub.firstCall.args[1].headers, {
                Accept: 'application/vnd.github+json',
                'User-Agent': 'test-agent',
                'X-GitHub-Api-Version': '2022-11-28',
                Authorization: 'Bearer test-token'
            });
        });

        it('does not attach an abort signal when no timeout is configured', async () => {
            httpStub.resolves(jsonResponse([sampleReleaseJson()]));

            await createProvider().fetchLatestRelease(widget);

            assert.isUndefined(httpStub.firstCall.args[1].signal);
        });

        it('fails with invalid-response on 404 regardless of body', async () => {
            httpStub.resolves(jsonResponse([sampleReleaseJson()], 404, 'Not Found'));

            const error = await captureRejection(createProvider().fetchLatestRelease(widget));

            assert.strictEqual(error.kind, 'invalid-response');
            assert.strictEqual(error.status, 404);
            assert.strictEqual(error.message, 'Invalid response from release API: HTTP 404 Not Found');
        });

        it('fails with invalid-response on 500', async () => {
            httpStub.resolves(jsonResponse({ message: 'Server Error' }, 500));

            const error = await captureRejection(createProvider().fetchLatestRelease(widget));

            assert.strictEqual(error.kind, 'invalid-response');
            assert.strictEqual(error.message, 'Invalid response from release API: HTTP 500');
        });

        it('fails with invalid-response when the body is missing or blank', async () => {
            httpStub.onFirstCall().resolves(new Response(null, { status: 204 }));
            httpStub.onSecondCall().resolves(new Response('   ', { status: 200 }));

            const missing = await captureRejection(createProvider().fetchLatestRelease(widget));
            const blank = await captureRejection(createProvider().fetchLatestRelease(widget));

            assert.strictEqual(missing.kind, 'invalid-response');
            assert.strictEqual(blank.kind, 'invalid-response');
            assert.strictEqual(blank.message, 'Invalid response from release API: empty body');
        });

        it('fails with no-releases on an empty collection', async () => {
            httpStub.resolves(jsonResponse([]));

            const error = await captureRejection(createProvider().fetchLatestRelease(widget));

            assert.strictEqual(error.kind, 'no-releases');
            assert.strictEqual(error.message, 'No releases published for octo/widget');
        });

        it('fails with decode on malformed JSON', async () => {
            httpStub.resolves(new Response('{"tag_name":', { status: 200 }));

            const error = await captureRejection(createProvider().fetchLatestRelease(widget));

            assert.strictEqual(error.kind, 'decode');
            assert.strictEqual(error.message, 'Could not decode release: response body is not valid JSON');
        });

        it('fails with decode when required fields are missing', async () => {
            httpStub.resolves(jsonResponse([{ tag_name: 'v1.2.3' }]));

            const error = await captureRejection(createProvider().fetchLatestRelease(widget));

            assert.strictEqual(error.kind, 'decode');
            assert.include(error.message, 'html_url');
        });

        it('fails with decode when any release in the collection is malformed', async () => {
            httpStub.resolves(jsonResponse([sampleReleaseJson('3.0.0'), {}]));

            const error = await captureRejection(createProvider().fetchLatestRelease(widget));

            assert.strictEqual(error.kind, 'decode');
            assert.strictEqual(error.message, 'Could not decode release: missing required field "tag_name"');
        });

        it('wraps transport failures as network errors with the cause', async () => {
            const cause = new Error('getaddrinfo ENOTFOUND api.github.com');
            httpStub.rejects(cause);

            const error = await captureRejection(createProvider().fetchLatestRelease(widget));

            assert.strictEqual(error.kind, 'network');
            assert.strictEqual(error.cause, cause);
            assert.strictEqual(error.message, 'Network request failed: getaddrinfo ENOTFOUND api.github.com');
        });

        it('aborts after the configured timeout', async () => {
            const hangingClient: HttpClient = (_url, init) => new Promise<Response>((_resolve, reject) => {
                init.signal?.addEventListener('abort', () => {
                    const abortError = new Error('This operation was aborted');
                    abortError.name = 'AbortError';
                    reject(abortError);
                });
            });

            const provider = new GitHubReleaseProvider({
                httpClient: hangingClient,
                timeoutMs: 10,
                logger: createLoggerStub()
            });
            const error = await captureRejection(provider.fetchLatestRelease(widget));

            assert.strictEqual(error.kind, 'network');
            assert.strictEqual(error.message, 'Network request failed: Request timed out after 10ms');
        });

        it('logs failures as warnings', async () => {
            const logger = createLoggerStub();
            httpStub.resolves(jsonResponse({}, 403, 'Forbidden'));

            await captureRejection(createProvider({ logger }).fetchLatestRelease(widget));

            assert.isTrue(logger.warn.calledOnceWith(
                'Release check for octo/widget failed: Invalid response from release API: HTTP 403 Forbidden'
            ));
        });

        it('uses the global fetch when no client is injected', async () => {
            const fetchStub = sinon.stub(globalThis, 'fetch').resolves(jsonResponse([sampleReleaseJson('5.0.0')]));

            const provider = new GitHubReleaseProvider({ logger: createLoggerStub() });
            const release = await provider.fetchLatestRelease(widget);

            assert.isTrue(fetchStub.calledOnce);
            assert.strictEqual(release.tagName, '5.0.0');
        });

        it('uses a custom VersionChecker when provided', async () => {
            const customChecker = new VersionChecker();
            const selectSpy = sinon.spy(customChecker, 'selectLatestRelease');
            httpStub.resolves(jsonResponse([sampleReleaseJson()]));

            await createProvider({ versionChecker: customChecker }).fetchLatestRelease(widget);

            assert.isTrue(selectSpy.calledOnce);
            assert.strictEqual(selectSpy.firstCall.args[1], 'collection');
            assert.strictEqual(selectSpy.firstCall.args[2], 'octo/widget');
        });
    });
});
