export const PITR_MARKER_FILE = '.pitr_restore_marker';

export const CHECKPOINTS_FILE = 'xtrabackup_checkpoints';
export const LOCAL_ARCHIVE_FILE = 'backup.tar.gz';
export const BACKUP_CONFIG_FILE = 'backup-my.cnf';
export const RESTORE_DIR_NAME = 'restore';

export const REPLAY_FILE_PREFIX = 'pitr_replay_';
export const BINLOG_SCRATCH_DIR_PREFIX = 'binlog_temp_pitr_';
export const EXISTING_DATA_BACKUP_PREFIX = 'existing_data_backup_';
