import {
    BackupFields,
    DeploymentConfig,
    OracleLogType,
    ReplicationMode,
    ResolvedInstancePlan,
    StorageFields,
} from 'lib/types';
import { deriveInstanceIdentifiers, instanceSuffix } from './identifier';
import { DEFAULT_ORACLE_PORT } from './security-rules';
import { DEFAULT_MASTER_USERNAME } from './credentials';
import { assertValidRdsIdentifier } from './naming';

export const DEFAULT_DB_NAME = 'ORCL';
export const DEFAULT_BACKUP_RETENTION_DAYS = 7;
export const DEFAULT_LOG_EXPORTS: OracleLogType[] = ['alert', 'audit', 'listener', 'trace'];

export interface SharedResourceNames {
    readonly parameterGroupName: string;
    readonly optionGroupName: string;
    readonly subnetGroupName: string;
}

/**
 * Names of the deployment-wide resources, derived from the base identifier.
 */
export function sharedResourceNames(identifier: string): SharedResourceNames {
    const base = identifier.toLowerCase();
    return {
        parameterGroupName: `${base}-pg`,
        optionGroupName: `${base}-og`,
        subnetGroupName: `${base}-sng`,
    };
}

/**
 * null when skipped; otherwise the explicit name (suffixed per instance when
 * there are several) or "<identifier>-final-snapshot".
 *
 * @throws {NamingConventionError} when the resulting name breaks the RDS identifier rule
 */
export function resolveFinalSnapshotIdentifier(
    config: Pick<DeploymentConfig, 'skipFinalSnapshot' | 'finalSnapshotIdentifier' | 'instanceCount'>,
    resourceIdentifier: string,
    index: number,
): string | null {
    if (config.skipFinalSnapshot) {
        return null;
    }
    let name = `${resourceIdentifier}-final-snapshot`;
    if (config.finalSnapshotIdentifier !== undefined) {
        name = config.instanceCount > 1
            ? `${config.finalSnapshotIdentifier}${instanceSuffix(index)}`
            : config.finalSnapshotIdentifier;
    }
    assertValidRdsIdentifier(name, 'Final snapshot identifier');
    return name;
}

function resolveStorage(config: DeploymentConfig, kmsKeyId: string | undefined): StorageFields {
    const { storage } = config;
    return {
        storageType: storage.type,
        allocatedStorage: storage.allocatedGB,
        ...(storage.maxAllocatedGB !== undefined ? { maxAllocatedStorage: storage.maxAllocatedGB } : {}),
        ...(storage.iops !== undefined ? { iops: storage.iops } : {}),
        ...(storage.throughput !== undefined ? { throughput: storage.throughput } : {}),
        encrypted: storage.encrypted ?? true,
        ...(kmsKeyId !== undefined ? { kmsKeyId } : {}),
    };
}

function resolveBackup(config: DeploymentConfig): BackupFields {
    return {
        backupRetentionPeriod: config.backup?.retentionDays ?? DEFAULT_BACKUP_RETENTION_DAYS,
        ...(config.backup?.window !== undefined ? { preferredBackupWindow: config.backup.window } : {}),
    };
}

/**
 * Instance Topology Resolver: one plan per instance, with the fields of the
 * active replication mode set and every other mode's fields null.
 *
 * @throws {ConfigurationError | NamingConventionError}
 */
export function resolveInstancePlans(
    config: DeploymentConfig,
    names: SharedResourceNames = sharedResourceNames(config.identifier),
): ResolvedInstancePlan[] {
    const { replication } = config;
    const isReplica = replication.mode !== ReplicationMode.PRIMARY;
    const identifiers = deriveInstanceIdentifiers(
        config.identifier,
        config.instanceCount,
        isReplica,
        config.identifierTemplate,
    );

    return identifiers.map((resourceIdentifier, index): ResolvedInstancePlan => {
        const base = {
            index,
            resourceIdentifier,
            instanceClass: config.instanceClass,
            port: config.network.port ?? DEFAULT_ORACLE_PORT,
            multiAz: config.multiAz ?? false,
            publiclyAccessible: config.network.publiclyAccessible ?? false,
            deletionProtection: config.deletionProtection ?? true,
            autoMinorVersionUpgrade: config.autoMinorVersionUpgrade ?? true,
            performanceInsights: config.performanceInsights ?? false,
            ...(config.backup?.maintenanceWindow !== undefined
                ? { preferredMaintenanceWindow: config.backup.maintenanceWindow }
                : {}),
            parameterGroupName: names.parameterGroupName,
            cloudwatchLogsExports: [...(config.cloudwatchLogsExports ?? DEFAULT_LOG_EXPORTS)],
            finalSnapshotIdentifier: resolveFinalSnapshotIdentifier(config, resourceIdentifier, index),
        };

        switch (replication.mode) {
            case ReplicationMode.PRIMARY:
                return {
                    ...base,
                    mode: ReplicationMode.PRIMARY,
                    engineFields: {
                        engine: config.engine,
                        engineVersion: config.engineVersion,
                        licenseModel: config.licenseModel ?? 'bring-your-own-license',
                        ...(config.characterSetName !== undefined ? { characterSetName: config.characterSetName } : {}),
                        ...(config.ncharCharacterSetName !== undefined
                            ? { ncharCharacterSetName: config.ncharCharacterSetName }
                            : {}),
                    },
                    storage: resolveStorage(config, config.storage.kmsKeyId),
                    credentials: {
                        username: config.credentials?.username ?? DEFAULT_MASTER_USERNAME,
                        dbName: config.dbName ?? DEFAULT_DB_NAME,
                    },
                    optionGroupName: names.optionGroupName,
                    subnetGroupName: names.subnetGroupName,
                    backup: resolveBackup(config),
                };
            case ReplicationMode.READ_REPLICA:
                return {
                    ...base,
                    mode: ReplicationMode.READ_REPLICA,
                    sourceDbInstanceIdentifier: replication.sourceDbInstanceIdentifier,
                    engineFields: null,
                    storage: null,
                    credentials: null,
                    optionGroupName: null,
                    subnetGroupName: null,
                    backup: null,
                };
            case ReplicationMode.CROSS_REGION_REPLICA:
                return {
                    ...base,
                    mode: ReplicationMode.CROSS_REGION_REPLICA,
                    sourceDbInstanceArn: replication.sourceDbInstanceArn,
                    sourceRegion: replication.sourceRegion,
                    engineFields: null,
                    storage: resolveStorage(config, replication.kmsKeyId ?? config.storage.kmsKeyId),
                    credentials: null,
                    optionGroupName: null,
                    subnetGroupName: names.subnetGroupName,
                    backup: resolveBackup(config),
                };
        }
    });
}
