/**
 * Unit Tests: Filesystem Change Source
 *
 * chokidar is replaced by an EventEmitter so no real directory is watched.
 *
 * @see libs/watcher/FilesystemChangeSource.ts
 */

import { describe, it, beforeEach, mock } from 'node:test';
import assert from 'node:assert';
import { EventEmitter } from 'node:events';
import type { FSWatcher } from 'chokidar';
import { FilesystemChangeSource, type WatchFactory } from '../../libs/watcher/FilesystemChangeSource.js';

class FakeWatcher extends EventEmitter {
    public closed = false;

    async close(): Promise<void> {
        this.closed = true;
    }
}

describe('FilesystemChangeSource', () => {
    let watcher: FakeWatcher;
    let watchFn: ReturnType<typeof mock.fn<WatchFactory>>;
    let notifyChanged: ReturnType<typeof mock.fn<() => void>>;
    let source: FilesystemChangeSource;

    beforeEach(() => {
        watcher = new FakeWatcher();
        watchFn = mock.fn<WatchFactory>(() => watcher as unknown as FSWatcher);
        notifyChanged = mock.fn<() => void>();
        source = new FilesystemChangeSource('/srv/data', { notifyChanged }, ['**/.cache/**'], watchFn);
    });

    it('should watch the root without reporting pre-existing files', () => {
        source.start();

        assert.strictEqual(watchFn.mock.callCount(), 1);
        assert.deepStrictEqual(watchFn.mock.calls[0]?.arguments, [
            '/srv/data',
            { ignoreInitial: true, persistent: true, ignored: ['**/.cache/**'] }
        ]);
        assert.strictEqual(source.isRunning, true);
    });

    it('should notify the sink once per filesystem event', () => {
        source.start();

        watcher.emit('all', 'add', '/srv/data/a.txt');
        watcher.emit('all', 'change', '/srv/data/a.txt');
        watcher.emit('all', 'unlink', '/srv/data/a.txt');

        assert.strictEqual(notifyChanged.mock.callCount(), 3);
        assert.strictEqual(source.observedEvents, 3);
    });

    it('should survive watcher errors', () => {
        source.start();

        watcher.emit('error', new Error('EMFILE: too many open files'));
        watcher.emit('all', 'addDir', '/srv/data/sub');

        assert.strictEqual(notifyChanged.mock.callCount(), 1);
    });

    it('should not open a second watcher', () => {
        source.start();
        source.start();

        assert.strictEqual(watchFn.mock.callCount(), 1);
    });

    it('should close the watcher on stop', async () => {
        source.start();
        await source.stop();

        assert.strictEqual(watcher.closed, true);
        assert.strictEqual(source.isRunning, false);

        await source.stop();
        assert.strictEqual(watchFn.mock.callCount(), 1);
    });
});
