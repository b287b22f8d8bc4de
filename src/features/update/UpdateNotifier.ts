import type { CheckerError } from './CheckerError';
import type { PresentationSize } from '../../configuration/settings';
import type { PresenterContext, UpdatePresenter } from './UpdatePresenter';
import type { ReleaseInfo } from './VersionChecker';

export interface NotifierOutput {
    write(chunk: string): unknown;
}

const ELLIPSIS = '…';

/**
 * Terminal presenter for update checks: a loading line, then the release
 * title, clipped release notes and the release link.
 */
export class UpdateNotifier implements UpdatePresenter {
    private disposed = false;

    constructor(
        private readonly currentVersion: string | null,
        private readonly size: PresentationSize,
        private readonly output: NotifierOutput = process.stdout
    ) { }

    static create(context: PresenterContext, output?: NotifierOutput): UpdateNotifier {
        return new UpdateNotifier(context.currentVersion, context.size, output);
    }

    loadingStarted(): void {
        this.print(['Checking for updates...']);
    }

    /**
     * Shows the new release, or a confirmation that the current version is the latest
     */
    resultReceived(release: ReleaseInfo, hasUpdate: boolean): void {
        const current = this.currentVersion ?? 'unknown';

        if (!hasUpdate) {
            this.print([this.clip(`Up to date (current: ${current}, latest: ${release.tagName})`)]);
            return;
        }

        const title = release.name?.trim() || release.tagName;
        this.print([
            this.clip(`${title} is available (current: ${current})`),
            ...this.formatNotes(release.notes),
            this.clip(`Release page: ${release.downloadUrl}`)
        ]);
    }

    errorReceived(error: CheckerError): void {
        this.print([this.clip(`Update check failed: ${error.message}`)]);
    }

    dispose(): void {
        this.disposed = true;
    }

    /**
     * Release notes limited to the presentation size; the title and link lines
     * take two of the available lines.
     */
    formatNotes(notes: string | null): string[] {
        const text = notes?.replace(/\r\n/g, '\n').trim();
        if (!text) {
            return [];
        }

        const maxLines = Math.max(1, this.size.height - 2);
        const lines = text.split('\n').map((line) => this.clip(line.trimEnd()));
        if (lines.length <= maxLines) {
            return lines;
        }

        return [...lines.slice(0, maxLines - 1), ELLIPSIS];
    }

    private clip(line: string): string {
        return line.length > this.size.width ? `${line.slice(0, this.size.width - 1)}${ELLIPSIS}` : line;
    }

    private print(lines: string[]): void {
        if (this.disposed) {
            return;
        }
        this.output.write(`${lines.join('\n')}\n`);
    }
}
