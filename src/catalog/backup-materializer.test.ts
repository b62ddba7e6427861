import assert from 'node:assert/strict';
import { access, readFile, rm } from 'node:fs/promises';
import { join } from 'node:path';
import { test } from 'node:test';
import { PitrError } from '../errors';
import { RecordingLogger } from '../logging/logger';
import {
    argValue,
    createTempDir,
    FakeCommandRunner,
    removeTempDir,
    writeFixture,
} from '../test-helpers';
import { TarArchiveTool } from '../tools/archive';
import { XtrabackupEngine } from '../tools/xtrabackup';
import { BackupTimestamp } from '../time/timestamp';
import { BlobStore, InMemoryBlobStore } from './blob-store';
import { CHECKPOINTS_FILE } from '../constants';
import { BackupMaterializer, MaterializerOptions } from './backup-materializer';
import { BackupEntry } from './models';

const OPTIONS: MaterializerOptions = {
    fetchMaxAttempts: 3,
    fetchRetryDelayMs: 10,
    sleep: async () => undefined,
};

class FlakyBlobStore implements BlobStore {
    gets = 0;

    constructor(
        private readonly inner: BlobStore,
        private readonly failures: number,
    ) {}

    list(prefix: string): Promise<string[]> {
        return this.inner.list(prefix);
    }

    async get(key: string): Promise<Uint8Array> {
        this.gets += 1;

        if (this.gets <= this.failures) {
            throw new Error('socket hang up');
        }

        return this.inner.get(key);
    }
}

function tarTargetDir(args: string[]): string {
    const index = args.indexOf('-C');

    return args[index + 1];
}

function setup(blobStore: BlobStore | null) {
    const runner = new FakeCommandRunner();

    runner.on('tar', async (invocation) => {
        await writeFixture(
            join(tarTargetDir(invocation.args), CHECKPOINTS_FILE),
            'backup_type = full-backuped\n',
        );
    });

    return {
        runner,
        build(root: string, logger = new RecordingLogger()) {
            return new BackupMaterializer(
                root,
                blobStore,
                new TarArchiveTool(runner),
                new XtrabackupEngine(runner),
                logger,
                OPTIONS,
            );
        },
    };
}

function localEntry(root: string, raw: string): BackupEntry {
    return {
        kind: 'full',
        timestamp: BackupTimestamp.parse(raw),
        location: {
            type: 'local',
            path: join(root, 'full', raw),
        },
    };
}

function remoteEntry(raw: string): BackupEntry {
    return {
        kind: 'incremental',
        timestamp: BackupTimestamp.parse(raw),
        location: {
            type: 'remote',
            key: `incremental/backup_${raw}.tar.gz`,
        },
    };
}

test('a directory with a checkpoints file is used as is', async () => {
    const root = await createTempDir('materialize');

    try {
        const entry = localEntry(root, '20251126_010000');

        await writeFixture(join(root, 'full', '20251126_010000', CHECKPOINTS_FILE), 'x');

        const { runner, build } = setup(null);
        const dir = await build(root).ensureReady(entry);

        assert.equal(dir, join(root, 'full', '20251126_010000'));
        assert.equal(runner.invocations.length, 0);
    } finally {
        await removeTempDir(root);
    }
});

test('a local archive is extracted into its directory', async () => {
    const root = await createTempDir('materialize');

    try {
        const entry = localEntry(root, '20251126_010000');
        const dir = join(root, 'full', '20251126_010000');

        await writeFixture(join(dir, 'backup.tar.gz'), 'archive');

        const { runner, build } = setup(null);

        assert.equal(await build(root).ensureReady(entry), dir);
        assert.deepEqual(runner.calls('tar')[0].args, [
            '-xzf',
            join(dir, 'backup.tar.gz'),
            '-C',
            dir,
        ]);
    } finally {
        await removeTempDir(root);
    }
});

test('a remote archive is downloaded with retries then extracted', async () => {
    const root = await createTempDir('materialize');

    try {
        const store = new FlakyBlobStore(new InMemoryBlobStore({
            'incremental/backup_20251126_020000.tar.gz': 'remote-archive',
        }), 2);
        const logger = new RecordingLogger();
        const { runner, build } = setup(store);
        const dir = await build(root, logger).ensureReady(
            remoteEntry('20251126_020000'),
        );

        assert.equal(dir, join(root, 'incremental', '20251126_020000'));
        assert.equal(store.gets, 3);
        assert.equal(runner.calls('tar').length, 1);
        assert.deepEqual(logger.messages('warn'), [
            'backup download attempt failed',
            'backup download attempt failed',
        ]);
        await assert.rejects(access(join(dir, 'backup.tar.gz')));
    } finally {
        await removeTempDir(root);
    }
});

test('a remote archive that never downloads is unavailable', async () => {
    const root = await createTempDir('materialize');

    try {
        const store = new FlakyBlobStore(new InMemoryBlobStore(), 0);
        const { build } = setup(store);

        await assert.rejects(
            build(root).ensureReady(remoteEntry('20251126_020000')),
            (error: unknown) => error instanceof PitrError &&
                error.code === 'backup_unavailable',
        );
        assert.equal(store.gets, 3);
    } finally {
        await removeTempDir(root);
    }
});

function decompressInPlace(runner: FakeCommandRunner, checkpoints?: string): void {
    runner.on('xtrabackup', async (invocation) => {
        const target = argValue(invocation.args, '--target-dir=');

        assert.ok(target);
        await rm(join(target, 'ibdata1.zst'), { force: true });
        await writeFixture(join(target, 'ibdata1'), 'decompressed');

        if (checkpoints) {
            await writeFixture(join(target, CHECKPOINTS_FILE), checkpoints);
        }
    }, (args) => args.includes('--decompress'));
}

test('compressed files trigger decompression', async () => {
    const root = await createTempDir('materialize');

    try {
        const entry = localEntry(root, '20251126_010000');
        const dir = join(root, 'full', '20251126_010000');

        await writeFixture(join(dir, 'ibdata1.zst'), 'compressed');

        const { runner, build } = setup(null);

        decompressInPlace(runner, 'decompressed');

        await build(root).ensureReady(entry);

        assert.deepEqual(runner.calls('xtrabackup')[0].args, [
            '--decompress',
            '--remove-original',
            `--target-dir=${dir}`,
        ]);
        assert.equal(
            await readFile(join(dir, CHECKPOINTS_FILE), 'utf8'),
            'decompressed',
        );
    } finally {
        await removeTempDir(root);
    }
});

test('a checkpoints file next to compressed files is still decompressed', async () => {
    const root = await createTempDir('materialize');

    try {
        const entry = localEntry(root, '20251126_010000');
        const dir = join(root, 'full', '20251126_010000');

        await writeFixture(join(dir, CHECKPOINTS_FILE), 'backup_type = full-backuped');
        await writeFixture(join(dir, 'ibdata1.zst'), 'compressed');

        const { runner, build } = setup(null);

        decompressInPlace(runner);

        assert.equal(await build(root).ensureReady(entry), dir);
        assert.equal(runner.calls('xtrabackup').length, 1);
        assert.equal(runner.calls('tar').length, 0);
        assert.equal(await readFile(join(dir, 'ibdata1'), 'utf8'), 'decompressed');
        await assert.rejects(access(join(dir, 'ibdata1.zst')));
    } finally {
        await removeTempDir(root);
    }
});

test('compressed files left after decompression make the backup incomplete', async () => {
    const root = await createTempDir('materialize');

    try {
        const entry = localEntry(root, '20251126_010000');
        const dir = join(root, 'full', '20251126_010000');

        await writeFixture(join(dir, CHECKPOINTS_FILE), 'backup_type = full-backuped');
        await writeFixture(join(dir, 'ibdata1.zst'), 'compressed');

        const { runner, build } = setup(null);

        await assert.rejects(
            build(root).ensureReady(entry),
            (error: unknown) => error instanceof PitrError &&
                error.code === 'backup_incomplete' &&
                error.message.includes('still holds compressed files'),
        );
        assert.equal(runner.calls('xtrabackup').length, 1);
    } finally {
        await removeTempDir(root);
    }
});

test('a directory that never becomes ready is incomplete', async () => {
    const root = await createTempDir('materialize');

    try {
        const entry = localEntry(root, '20251126_010000');

        await writeFixture(join(root, 'full', '20251126_010000', 'partial'), 'x');

        const { build } = setup(null);

        await assert.rejects(
            build(root).ensureReady(entry),
            (error: unknown) => error instanceof PitrError &&
                error.code === 'backup_incomplete',
        );
    } finally {
        await removeTempDir(root);
    }
});

test('a failed extraction is reported as a tool failure', async () => {
    const root = await createTempDir('materialize');

    try {
        const entry = localEntry(root, '20251126_010000');

        await writeFixture(join(root, 'full', '20251126_010000', 'backup.tar.gz'), 'x');

        const { runner, build } = setup(null);

        runner.on('tar', () => ({ exitCode: 2, stderr: 'gzip: stdin: not in gzip format' }));

        await assert.rejects(
            build(root).ensureReady(entry),
            /extracting full@20251126_010000 failed: gzip: stdin: not in gzip format/,
        );
    } finally {
        await removeTempDir(root);
    }
});
