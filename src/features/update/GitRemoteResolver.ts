import { simpleGit, type RemoteWithRefs, type SimpleGit } from 'simple-git';
import { CheckerError, describeError } from './CheckerError';
import { gitRemote, type RepositoryLocator } from './RepositoryLocator';

/**
 * Builds a git-remote locator from a working copy's configured remote.
 *
 * @returns `null` when the remote is not configured
 * @throws CheckerError (`invalid-input`) when `repoDir` is not a readable git repository
 */
export async function resolveGitRemoteLocator(
    repoDir: string,
    remoteName: string = 'origin'
): Promise<RepositoryLocator | null> {
    const git: SimpleGit = simpleGit(repoDir);

    let remotes: RemoteWithRefs[];
    try {
        remotes = await git.getRemotes(true);
    } catch (error) {
        throw CheckerError.invalidInput(`could not read remotes of ${repoDir}: ${describeError(error)}`);
    }

    const remote = remotes.find((candidate) => candidate.name === remoteName);
    const url = remote?.refs.fetch || remote?.refs.push;
    return url ? gitRemote(url) : null;
}
