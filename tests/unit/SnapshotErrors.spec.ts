/**
 * Unit Tests: Snapshot Errors
 *
 * @see libs/errors/snapshotErrors.ts
 */

import { describe, it } from 'node:test';
import assert from 'node:assert';
import {
    describeError,
    InvalidSnapshotIdentityError,
    SnapshotConfigError
} from '../../libs/errors/snapshotErrors.js';

describe('Snapshot errors', () => {
    it('InvalidSnapshotIdentityError should carry field and code', () => {
        const error = new InvalidSnapshotIdentityError('node', 'must not be empty');

        assert.ok(error instanceof Error);
        assert.ok(error instanceof InvalidSnapshotIdentityError);
        assert.strictEqual(error.name, 'InvalidSnapshotIdentityError');
        assert.strictEqual(error.code, 'INVALID_SNAPSHOT_IDENTITY');
        assert.strictEqual(error.field, 'node');
        assert.strictEqual(error.message, 'Invalid snapshot identity (node): must not be empty');
    });

    it('SnapshotConfigError should list its issues', () => {
        const error = new SnapshotConfigError('agent', [{ path: 'SNAPSHOT_COMMAND', message: 'Required' }]);

        assert.ok(error instanceof SnapshotConfigError);
        assert.strictEqual(error.code, 'INVALID_CONFIGURATION');
        assert.strictEqual(
            error.message,
            'Configuration violation in agent: [{"path":"SNAPSHOT_COMMAND","message":"Required"}]'
        );
    });

    describe('describeError()', () => {
        it('should use the message of an Error', () => {
            assert.strictEqual(describeError(new TypeError('bad input')), 'bad input');
        });

        it('should pass strings through', () => {
            assert.strictEqual(describeError('timeout'), 'timeout');
        });

        it('should read a message property from plain objects', () => {
            assert.strictEqual(describeError({ message: 'remote failure' }), 'remote failure');
        });

        it('should stringify anything else', () => {
            assert.strictEqual(describeError(42), '42');
            assert.strictEqual(describeError(undefined), 'undefined');
            assert.strictEqual(describeError({ message: 7 }), '[object Object]');
        });
    });
});
