import assert from 'node:assert/strict';
import { access, readFile } from 'node:fs/promises';
import { join } from 'node:path';
import { describe, test } from 'node:test';
import { InMemoryBlobStore } from '../catalog/blob-store';
import { CHECKPOINTS_FILE } from '../constants';
import { parsePitrEnv } from '../env';
import { RecordingLogger } from '../logging/logger';
import {
    argValue,
    createTempDir,
    FakeCommandRunner,
    fixedNow,
    removeTempDir,
    writeFixture,
} from '../test-helpers';
import { createPitrService } from './create-pitr-service';
import { PitrService } from './pitr-service';

interface Fixture {
    root: string;
    dataDir: string;
    runner: FakeCommandRunner;
    service: PitrService;
}

async function withFixture(run: (fixture: Fixture) => Promise<void>): Promise<void> {
    const root = await createTempDir('pitr');
    const dataDir = join(root, 'mysql');
    const runner = new FakeCommandRunner();
    const logger = new RecordingLogger();
    const blobStore = new InMemoryBlobStore({
        'incremental/backup_20251126_020000.tar.gz': 'remote-archive',
    });

    await writeFixture(join(root, 'full', '20251126_000000', CHECKPOINTS_FILE), 'full');
    await writeFixture(join(root, 'incremental', '20251126_010000', CHECKPOINTS_FILE), 'inc');
    await writeFixture(join(dataDir, 'ibdata1'), 'current');
    await writeFixture(join(dataDir, 'mysql-bin.000001'), 'live');
    await writeFixture(join(dataDir, 'mysql-bin.index'), './mysql-bin.000001\n');

    runner.on('tar', async (invocation) => {
        const index = invocation.args.indexOf('-C');

        await writeFixture(join(invocation.args[index + 1], CHECKPOINTS_FILE), 'remote');
    });
    runner.on('xtrabackup', async (invocation) => {
        const target = argValue(invocation.args, '--datadir=');

        assert.ok(target);
        await writeFixture(join(target, 'ibdata1'), 'restored');
    }, (args) => args.includes('--copy-back'));
    runner.on('mysqlbinlog', () => ({ stdout: 'INSERT INTO orders VALUES (9);\n' }));

    const env = parsePitrEnv({
        BACKUP_BASE_DIR: root,
        MYSQL_DATA_DIR: dataDir,
        RESTORE_TZ: 'Asia/Shanghai',
        MYSQL_ROOT_PASSWORD: 'test-password',
    });
    const service = createPitrService(env, {
        runner,
        blobStore,
        logger: () => logger,
        now: fixedNow,
        sleep: async () => undefined,
        randomSuffix: () => 4821,
    });

    try {
        await run({ root, dataDir, runner, service });
    } finally {
        await removeTempDir(root);
    }
}

describe('restoreToPointInTime', () => {
    test('restores through a remote incremental and queues the binlog replay', async () => {
        await withFixture(async (fixture) => {
            // 10:30 in Shanghai is 02:30 UTC, after the remote incremental.
            const result = await fixture.service.restoreToPointInTime({
                targetTime: '2025-11-26 10:30:00',
            });

            assert.ok(result.success);
            assert.equal(result.chain.base.timestamp.toString(), '20251126_000000');
            assert.deepEqual(
                result.chain.incrementals.map((entry) => entry.timestamp.toString()),
                ['20251126_020000'],
            );

            const replayFile = join(fixture.root, 'pitr_replay_20251126_080000_4821.sql');

            assert.equal(result.pendingReplayFile, replayFile);
            assert.deepEqual(fixture.runner.calls('mysqlbinlog')[0].args.slice(0, 5), [
                '--skip-gtids',
                '--start-datetime',
                '2025-11-26 02:00:00',
                '--stop-datetime',
                '2025-11-26 02:30:01',
            ]);
            assert.equal(
                await readFile(join(fixture.root, '.pitr_restore_marker'), 'utf8'),
                replayFile,
            );
            assert.equal(await readFile(join(fixture.dataDir, 'ibdata1'), 'utf8'), 'restored');
            assert.equal(
                await readFile(join(fixture.dataDir, 'mysql-bin.000001'), 'utf8'),
                'live',
            );
        });
    });

    test('the pending replay is applied once', async () => {
        await withFixture(async (fixture) => {
            const restored = await fixture.service.restoreToPointInTime({
                targetTime: '2025-11-26 09:30:00',
            });

            assert.ok(restored.success);

            const first = await fixture.service.applyPendingBinlog();
            const second = await fixture.service.applyPendingBinlog();

            assert.equal(first.status, 'applied');
            assert.deepEqual(second, { status: 'no_pending' });

            const [apply] = fixture.runner.calls('mysql');

            assert.equal(
                apply.stdinFile,
                join(fixture.root, 'pitr_replay_20251126_080000_4821.sql'),
            );
            assert.deepEqual(apply.env, { MYSQL_PWD: 'test-password' });
            assert.equal(apply.timeoutMs, 3_600_000);
            await assert.rejects(access(join(fixture.root, '.pitr_restore_marker')));
        });
    });

    test('an explicit chain is honored', async () => {
        await withFixture(async (fixture) => {
            const result = await fixture.service.restoreToPointInTime({
                targetTime: '2025-11-26 10:30:00',
                fullBackup: '20251126_000000',
                incrementals: ['20251126_010000'],
            });

            assert.ok(result.success);
            assert.equal(result.chain.selection, 'explicit_full');
            assert.equal(result.restore.lastAppliedBackup.timestamp.toString(), '20251126_010000');
            assert.deepEqual(fixture.runner.calls('tar'), []);
        });
    });

    test('a malformed target is rejected before anything runs', async () => {
        await withFixture(async (fixture) => {
            const result = await fixture.service.restoreToPointInTime({
                targetTime: '2025/11/26 10:30',
            });

            assert.ok(!result.success);
            assert.equal(result.status, 'invalid_request');
            assert.equal(result.error.code, 'invalid_target_time');
            assert.equal(fixture.runner.invocations.length, 0);
        });
    });

    test('a target before every backup fails resolution', async () => {
        await withFixture(async (fixture) => {
            const result = await fixture.service.restoreToPointInTime({
                targetTime: '2025-11-26 07:59:59',
            });

            assert.ok(!result.success);
            assert.equal(result.status, 'resolution_failed');
            assert.equal(result.error.code, 'no_backup_before_target');
        });
    });

    test('a failed merge is reported with its phase', async () => {
        await withFixture(async (fixture) => {
            fixture.runner.on(
                'xtrabackup',
                () => ({ exitCode: 1, stderr: 'log sequence number mismatch' }),
                (args) => args.includes('--prepare'),
            );

            const result = await fixture.service.restoreToPointInTime({
                targetTime: '2025-11-26 09:30:00',
            });

            assert.ok(!result.success);
            assert.ok(result.status === 'restore_failed');
            assert.equal(result.restore.failedPhase, 'base_merging');
            assert.equal(result.restore.needsManualRestore, false);
            assert.deepEqual(fixture.runner.calls('mysqlbinlog'), []);
        });
    });
});

describe('prepare and apply in two steps', () => {
    test('named backups are prepared aside and applied later', async () => {
        await withFixture(async (fixture) => {
            const restoreDir = join(fixture.root, 'restore');

            fixture.runner.on('xtrabackup', async (invocation) => {
                const target = argValue(invocation.args, '--target-dir=');

                assert.ok(target);
                await writeFixture(join(target, CHECKPOINTS_FILE), 'backup_type = full-prepared\n');
                await writeFixture(join(target, 'backup-my.cnf'), '[mysqld]\n');
            }, (args) => args.includes('--prepare') && !args.includes('--apply-log-only'));

            const prepared = await fixture.service.prepareBackup({
                fullBackup: 'backup_20251126_000000.tar.gz',
                incrementals: ['20251126_020000'],
            });

            assert.ok(prepared.success);
            assert.equal(prepared.prepare.restoreDir, restoreDir);
            assert.equal(prepared.set.incrementals[0].location.type, 'remote');
            assert.equal(fixture.runner.calls('tar').length, 1);
            assert.equal(await readFile(join(fixture.dataDir, 'ibdata1'), 'utf8'), 'current');
            assert.equal(
                await readFile(join(fixture.root, 'full', '20251126_000000', CHECKPOINTS_FILE), 'utf8'),
                'full',
            );

            const applied = await fixture.service.applyPreparedRestore();

            assert.ok(applied.success);
            assert.equal(applied.sourceDir, restoreDir);
            assert.equal(await readFile(join(fixture.dataDir, 'ibdata1'), 'utf8'), 'restored');
            assert.equal(
                await readFile(join(fixture.dataDir, 'mysql-bin.000001'), 'utf8'),
                'live',
            );
            assert.deepEqual(fixture.runner.calls('mysqlbinlog'), []);
        });
    });

    test('an unknown full backup fails resolution', async () => {
        await withFixture(async (fixture) => {
            const result = await fixture.service.prepareBackup({ fullBackup: '20251120_000000' });

            assert.ok(!result.success);
            assert.equal(result.status, 'resolution_failed');
            assert.equal(result.error.code, 'invalid_chain_override');
            assert.equal(fixture.runner.invocations.length, 0);
        });
    });
});

test('listBackups merges local and remote entries', async () => {
    await withFixture(async (fixture) => {
        const snapshot = await fixture.service.listBackups();

        assert.equal(snapshot.remoteStatus, 'ok');
        assert.deepEqual(
            snapshot.incremental.map((entry) => entry.location.type),
            ['local', 'remote'],
        );
    });
});
