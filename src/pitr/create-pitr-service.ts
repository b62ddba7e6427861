import { DeferredApplyEngine } from '../apply/deferred-apply-engine';
import { FilePendingApplyMarkerStore, PendingApplyMarkerStore } from '../apply/pending-apply-marker';
import { BinlogExtractor } from '../binlog/binlog-extractor';
import { BackupCatalog } from '../catalog/backup-catalog';
import { BackupMaterializer } from '../catalog/backup-materializer';
import type { BlobStore } from '../catalog/blob-store';
import type { PitrEnv } from '../env';
import { createConsoleLogger, PitrLogger } from '../logging/logger';
import { BinlogFiles } from '../restore/binlog-files';
import { DataDirectory } from '../restore/data-dir';
import { RestorePipeline } from '../restore/restore-pipeline';
import { TarArchiveTool } from '../tools/archive';
import type { CommandRunner } from '../tools/command-runner';
import { MysqlCliClient } from '../tools/mysql-client';
import { MysqlbinlogTool } from '../tools/mysqlbinlog';
import { ChownDataDirPermissions } from '../tools/permissions';
import { XtrabackupEngine } from '../tools/xtrabackup';
import { PitrService } from './pitr-service';

export interface PitrServiceOverrides {
    runner: CommandRunner;
    blobStore: BlobStore | null;
    markerStore?: PendingApplyMarkerStore;
    logger?: (component: string) => PitrLogger;
    now?: () => Date;
    sleep?: (ms: number) => Promise<void>;
    randomSuffix?: () => number;
}

export function createPitrService(
    env: PitrEnv,
    overrides: PitrServiceOverrides,
): PitrService {
    const loggerFor = overrides.logger || createConsoleLogger;
    const { runner, blobStore } = overrides;
    const engine = new XtrabackupEngine(runner, env.binaries.xtrabackup);
    const binlogFiles = new BinlogFiles(
        env.mysqlDataDir,
        env.binlogBasename,
        loggerFor('binlog-files'),
    );
    const markerStore = overrides.markerStore ||
        new FilePendingApplyMarkerStore(env.markerPath);
    const client = new MysqlCliClient(runner, {
        host: env.mysqlHost,
        port: env.mysqlPort,
        user: env.mysqlUser,
        password: env.mysqlPassword,
    }, {
        mysql: env.binaries.mysql,
        mysqladmin: env.binaries.mysqladmin,
    });
    const materializer = new BackupMaterializer(
        env.backupBaseDir,
        blobStore,
        new TarArchiveTool(runner, env.binaries.tar),
        engine,
        loggerFor('materializer'),
        {
            fetchMaxAttempts: env.blobFetchMaxAttempts,
            fetchRetryDelayMs: env.blobFetchRetryDelaySeconds * 1000,
            sleep: overrides.sleep,
        },
    );

    return new PitrService({
        catalog: new BackupCatalog(
            env.backupBaseDir,
            blobStore,
            loggerFor('catalog'),
        ),
        pipeline: new RestorePipeline({
            materializer,
            engine,
            permissions: new ChownDataDirPermissions(runner, env.dataDirOwner, {
                chown: env.binaries.chown,
                chmod: env.binaries.chmod,
            }),
            binlogFiles,
            dataDir: new DataDirectory(env.mysqlDataDir),
            logger: loggerFor('restore'),
            now: overrides.now,
        }, {
            backupRoot: env.backupBaseDir,
            backupExistingData: env.backupExistingData,
            useMoveBack: env.useMoveBack,
        }),
        extractor: new BinlogExtractor({
            tool: new MysqlbinlogTool(runner, env.binaries.mysqlbinlog),
            binlogFiles,
            markerStore,
            logger: loggerFor('binlog'),
            now: overrides.now,
            randomSuffix: overrides.randomSuffix,
        }, env.backupBaseDir),
        applyEngine: new DeferredApplyEngine({
            markerStore,
            client,
            logger: loggerFor('apply'),
        }, {
            replayTimeoutMs: env.replayTimeoutSeconds * 1000,
            readiness: {
                maxAttempts: env.readyMaxAttempts,
                intervalMs: env.readyIntervalSeconds * 1000,
                sleep: overrides.sleep,
            },
        }),
        logger: loggerFor('pitr'),
    }, {
        timeZone: env.restoreTimeZone,
        restoreDir: env.restoreDir,
    });
}
