/**
 * Filesystem Change Source
 *
 * Watches a directory tree with chokidar and turns every add, change or
 * unlink event into a notifyChanged() call. No per-path state is kept: the
 * coordinator snapshots the whole filesystem, so the only thing that
 * matters is that something changed.
 */

import { watch, type FSWatcher, type WatchOptions } from 'chokidar';
import { getComponentLogger } from '../logging/logger.js';
import { describeError } from '../errors/snapshotErrors.js';

const logger = getComponentLogger('FilesystemChangeSource');

export interface ChangeSink {
    notifyChanged(): void;
}

export type WatchFactory = (paths: string, options: WatchOptions) => FSWatcher;

export class FilesystemChangeSource {
    private watcher: FSWatcher | null = null;
    private eventCount = 0;

    constructor(
        private readonly root: string,
        private readonly sink: ChangeSink,
        private readonly ignored: readonly string[] = [],
        private readonly watchFn: WatchFactory = watch
    ) { }

    /**
     * Start watching. Events that predate start() are not reported.
     */
    public start(): void {
        if (this.watcher) {
            logger.warn({ root: this.root }, 'FilesystemChangeSource already running');
            return;
        }

        this.watcher = this.watchFn(this.root, {
            ignoreInitial: true,
            persistent: true,
            ignored: [...this.ignored]
        });

        this.watcher.on('all', (eventName, path) => {
            this.eventCount += 1;
            logger.debug({ eventName, path }, 'Filesystem change observed');
            this.sink.notifyChanged();
        });

        this.watcher.on('error', (error: unknown) => {
            logger.error({ root: this.root, error: describeError(error) }, 'Filesystem watcher error');
        });

        logger.info({ root: this.root, ignored: this.ignored }, 'FilesystemChangeSource started');
    }

    public async stop(): Promise<void> {
        if (!this.watcher) return;

        const watcher = this.watcher;
        this.watcher = null;
        await watcher.close();
        logger.info({ root: this.root, eventCount: this.eventCount }, 'FilesystemChangeSource stopped');
    }

    public get isRunning(): boolean {
        return this.watcher !== null;
    }

    /** Events forwarded since construction. */
    public get observedEvents(): number {
        return this.eventCount;
    }
}
