import assert from 'node:assert/strict';
import { access, readdir, readFile } from 'node:fs/promises';
import { join } from 'node:path';
import { test } from 'node:test';
import { InMemoryPendingApplyMarkerStore } from '../apply/pending-apply-marker';
import { RecordingLogger } from '../logging/logger';
import { BinlogFiles } from '../restore/binlog-files';
import {
    createTempDir,
    FakeCommandRunner,
    fixedNow,
    removeTempDir,
    writeFixture,
} from '../test-helpers';
import { BackupTimestamp, parseTargetSpec } from '../time/timestamp';
import { MysqlbinlogTool } from '../tools/mysqlbinlog';
import { BinlogExtractor } from './binlog-extractor';

interface Fixture {
    root: string;
    dataDir: string;
    runner: FakeCommandRunner;
    markers: InMemoryPendingApplyMarkerStore;
    logger: RecordingLogger;
    extractor: BinlogExtractor;
}

async function withFixture(
    segments: string[],
    run: (fixture: Fixture) => Promise<void>,
): Promise<void> {
    const root = await createTempDir('extract');
    const dataDir = join(root, 'mysql');
    const runner = new FakeCommandRunner();
    const markers = new InMemoryPendingApplyMarkerStore();
    const logger = new RecordingLogger();

    for (const name of segments) {
        await writeFixture(join(dataDir, name), 'binlog');
    }

    await writeFixture(join(dataDir, 'ibdata1'), 'data');

    const extractor = new BinlogExtractor({
        tool: new MysqlbinlogTool(runner),
        binlogFiles: new BinlogFiles(dataDir, 'mysql-bin', logger),
        markerStore: markers,
        logger,
        now: fixedNow,
        randomSuffix: () => 4821,
    }, root);

    try {
        await run({ root, dataDir, runner, markers, logger, extractor });
    } finally {
        await removeTempDir(root);
    }
}

const backupInstant = BackupTimestamp.parse('20251126_030000').toInstant();
const target = parseTargetSpec('2025-11-26 14:30:00', 'Asia/Shanghai');

test('all segments are extracted in one call and the marker is written', async () => {
    await withFixture(['mysql-bin.000001', 'mysql-bin.000002'], async (fixture) => {
        fixture.runner.on('mysqlbinlog', () => ({ stdout: 'INSERT INTO t VALUES (1);\n' }));

        const outcome = await fixture.extractor.extract(backupInstant, target);
        const replayFile = join(fixture.root, 'pitr_replay_20251126_080000_4821.sql');

        assert.ok(outcome.status === 'extracted');
        assert.equal(outcome.mode, 'batched');
        assert.equal(outcome.replayFile, replayFile);
        assert.equal(outcome.bytes, 26);
        assert.deepEqual(fixture.runner.calls('mysqlbinlog')[0].args, [
            '--skip-gtids',
            '--start-datetime',
            '2025-11-26 03:00:00',
            '--stop-datetime',
            '2025-11-26 06:30:01',
            join(fixture.dataDir, 'mysql-bin.000001'),
            join(fixture.dataDir, 'mysql-bin.000002'),
        ]);
        assert.equal(fixture.markers.content, replayFile);
    });
});

test('a failing batch falls back to the segments that still read', async () => {
    await withFixture(
        ['mysql-bin.000001', 'mysql-bin.000002', 'mysql-bin.000003'],
        async (fixture) => {
            fixture.runner.on('mysqlbinlog', (invocation) => {
                const files = invocation.args.filter((arg) => arg.includes('mysql-bin.'));

                if (files.length > 1) {
                    return { exitCode: 1, stderr: 'Could not read entry at offset 120' };
                }

                if (files[0].endsWith('000002')) {
                    return { exitCode: 1, stderr: 'corrupted' };
                }

                return { stdout: `-- from ${files[0].slice(-6)}\n` };
            });

            const outcome = await fixture.extractor.extract(backupInstant, target);

            assert.ok(outcome.status === 'extracted');
            assert.equal(outcome.mode, 'per_segment');
            assert.deepEqual(outcome.failedSegments, [
                join(fixture.dataDir, 'mysql-bin.000002'),
            ]);
            assert.equal(
                await readFile(outcome.replayFile, 'utf8'),
                '-- from 000001\n-- from 000003\n',
            );
            assert.deepEqual((await readdir(fixture.root)).sort(), [
                'mysql',
                'pitr_replay_20251126_080000_4821.sql',
            ]);
        },
    );
});

test('every segment failing is fatal and leaves no replay file or marker', async () => {
    await withFixture(['mysql-bin.000001'], async (fixture) => {
        fixture.runner.on('mysqlbinlog', () => ({ exitCode: 1, stderr: 'bad magic' }));

        const outcome = await fixture.extractor.extract(backupInstant, target);

        assert.ok(outcome.status === 'failed');
        assert.equal(outcome.error.code, 'extraction_failed');
        assert.equal(fixture.markers.content, null);
        await assert.rejects(
            access(join(fixture.root, 'pitr_replay_20251126_080000_4821.sql')),
        );
    });
});

test('a target before the backup skips extraction entirely', async () => {
    await withFixture(['mysql-bin.000001'], async (fixture) => {
        const outcome = await fixture.extractor.extract(
            backupInstant,
            parseTargetSpec('2025-11-26 10:00:00', 'Asia/Shanghai'),
        );

        assert.equal(outcome.status, 'skipped');
        assert.equal(fixture.runner.invocations.length, 0);
        assert.equal(fixture.markers.content, null);
    });
});

test('no segments is reported without failing', async () => {
    await withFixture([], async (fixture) => {
        const outcome = await fixture.extractor.extract(backupInstant, target);

        assert.equal(outcome.status, 'no_segments');
        assert.equal(fixture.markers.content, null);
        assert.deepEqual(fixture.logger.messages('warn'), [
            'no binlog segments found, nothing to replay',
        ]);
    });
});

test('an empty extract is dropped instead of queued', async () => {
    await withFixture(['mysql-bin.000001'], async (fixture) => {
        const outcome = await fixture.extractor.extract(backupInstant, target);

        assert.equal(outcome.status, 'empty');
        assert.equal(fixture.markers.content, null);
        assert.deepEqual(await readdir(fixture.root), ['mysql']);
    });
});
