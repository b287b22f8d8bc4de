import * as fs from 'fs';
import * as path from 'path';
import { logger } from '../../utils/logger';
import { describeError } from './CheckerError';

/**
 * Returns the host application's current version, or `null` when its metadata
 * does not carry one.
 */
export type CurrentVersionSource = () => string | null;

/**
 * Reads the `version` field of a package.json file.
 */
export function readPackageVersion(packageJsonPath: string): string | null {
    try {
        if (!fs.existsSync(packageJsonPath)) {
            return null;
        }

        const parsed: unknown = JSON.parse(fs.readFileSync(packageJsonPath, 'utf8'));
        if (typeof parsed !== 'object' || parsed === null || !('version' in parsed)) {
            return null;
        }

        const version = parsed.version;
        return typeof version === 'string' && version.trim() ? version.trim() : null;
    } catch (error) {
        logger.warn(`Could not read version from ${packageJsonPath}: ${describeError(error)}`);
        return null;
    }
}

export function packageVersion(packageJsonPath: string): CurrentVersionSource {
    return () => readPackageVersion(packageJsonPath);
}

export function staticVersion(version: string | null): CurrentVersionSource {
    return () => version;
}

/**
 * Version of the running application: `npm_package_version` when launched
 * through an npm script, otherwise the package.json in the working directory.
 */
export function hostApplicationVersion(
    env: NodeJS.ProcessEnv = process.env,
    cwd: string = process.cwd()
): CurrentVersionSource {
    return () => {
        const fromEnv = env.npm_package_version?.trim();
        if (fromEnv) {
            return fromEnv;
        }
        return readPackageVersion(path.join(cwd, 'package.json'));
    };
}
