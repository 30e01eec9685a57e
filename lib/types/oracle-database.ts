/**
 * Supported Oracle engine families
 */
export const ORACLE_ENGINES = ['oracle-ee', 'oracle-ee-cdb', 'oracle-se2', 'oracle-se2-cdb'] as const;
export type OracleEngine = typeof ORACLE_ENGINES[number];

export const STORAGE_TYPES = ['gp2', 'gp3', 'io1', 'io2', 'standard'] as const;
export type StorageType = typeof STORAGE_TYPES[number];

export const LICENSE_MODELS = ['license-included', 'bring-your-own-license'] as const;
export type LicenseModel = typeof LICENSE_MODELS[number];

export const ORACLE_LOG_TYPES = ['alert', 'audit', 'listener', 'trace', 'oemagent'] as const;
export type OracleLogType = typeof ORACLE_LOG_TYPES[number];

// Replication mode
export enum ReplicationMode {
    /**
     * Standalone, independently configured instance
     */
    PRIMARY = 'primary',
    /**
     * Replica of a primary in the same region
     */
    READ_REPLICA = 'read-replica',
    /**
     * Replica of a primary located in another region
     */
    CROSS_REGION_REPLICA = 'cross-region-replica',
}

export interface PrimaryReplication {
    readonly mode: ReplicationMode.PRIMARY;
}

export interface ReadReplicaReplication {
    readonly mode: ReplicationMode.READ_REPLICA;
    /** Identifier or ARN of the source instance */
    readonly sourceDbInstanceIdentifier: string;
}

export interface CrossRegionReplication {
    readonly mode: ReplicationMode.CROSS_REGION_REPLICA;
    /** ARN of the source instance in the other region */
    readonly sourceDbInstanceArn: string;
    /** Region of the source instance */
    readonly sourceRegion: string;
    /**
     * KMS key in this region used to encrypt the replica
     * @default - storage.kmsKeyId
     */
    readonly kmsKeyId?: string;
}

export type ReplicationConfig = PrimaryReplication | ReadReplicaReplication | CrossRegionReplication;

export interface StorageConfig {
    /** Storage type */
    readonly type: StorageType;
    /** Storage size (GiB) */
    readonly allocatedGB: number;
    /**
     * Upper limit for storage autoscaling (GiB)
     * @default - autoscaling disabled
     */
    readonly maxAllocatedGB?: number;
    /** Provisioned IOPS, required for io1/io2 */
    readonly iops?: number;
    /** Throughput in MiBps, gp3 only */
    readonly throughput?: number;
    /**
     * Whether storage is encrypted
     * @default true
     */
    readonly encrypted?: boolean;
    readonly kmsKeyId?: string;
}

export interface IngressRuleConfig {
    /** @default 1521 */
    readonly fromPort?: number;
    /** @default 1521 */
    readonly toPort?: number;
    /** @default "tcp" */
    readonly protocol?: string;
    /** Source CIDR. Exactly one of cidrBlock / sourceSecurityGroupId */
    readonly cidrBlock?: string;
    readonly sourceSecurityGroupId?: string;
    readonly description?: string;
}

export interface NetworkConfig {
    /**
     * VPC of the database. The security group is only created when set.
     */
    readonly vpcId?: string;
    readonly ingressRules: IngressRuleConfig[];
    /**
     * Listener port
     * @default 1521
     */
    readonly port?: number;
    /** @default false */
    readonly publiclyAccessible?: boolean;
}

export interface BackupConfig {
    /** @default 7 */
    readonly retentionDays: number;
    /** UTC, e.g. "17:00-18:00" */
    readonly window?: string;
    /** UTC, e.g. "sun:18:00-sun:19:00" */
    readonly maintenanceWindow?: string;
}

export interface OptionGroupConfig {
    /**
     * Path of the JSON document holding parameter group parameters and option lists
     */
    readonly documentPath: string;
    /**
     * Use the ssl_option list instead of option_group_options
     * @default false
     */
    readonly enableSslOption?: boolean;
}

export interface PasswordPolicy {
    /** @default 16 */
    readonly length?: number;
    /** 0 or 1. @default 1 */
    readonly minLower?: number;
    /** 0 or 1. @default 1 */
    readonly minUpper?: number;
    /** 0 or 1. @default 1 */
    readonly minNumeric?: number;
    /** 0 or 1. @default 1 */
    readonly minSpecial?: number;
    /** @default true */
    readonly special?: boolean;
    /**
     * Special characters allowed in the password
     * @default "!#$%&*()-_=+[]{}<>:?"
     */
    readonly overrideSpecial?: string;
}

export interface CredentialConfig {
    /**
     * Master username
     * @default "oraadmin"
     */
    readonly username?: string;
    readonly passwordPolicy?: PasswordPolicy;
    /**
     * Secret path root; the environment folder and instance address are appended
     * @default "database"
     */
    readonly secretBasePath?: string;
    /**
     * Destroy the secret-store entry with all of its versions when the stack is deleted
     * @default false
     */
    readonly deleteAllVersions?: boolean;
}

/**
 * Oracle database deployment configuration
 */
export interface DeploymentConfig {
    /** Base DB instance identifier */
    readonly identifier: string;
    /**
     * Templated identifier; "-I" is replaced by "-0{n}" for each instance
     * @default `${identifier}-I`
     */
    readonly identifierTemplate?: string;
    /** Number of instances, 1 to 9 */
    readonly instanceCount: number;
    readonly replication: ReplicationConfig;
    readonly engine: OracleEngine;
    readonly engineVersion: string;
    /** DB instance class, e.g. "db.m6i.large" */
    readonly instanceClass: string;
    /** @default "bring-your-own-license" */
    readonly licenseModel?: LicenseModel;
    readonly characterSetName?: string;
    readonly ncharCharacterSetName?: string;
    /**
     * Oracle SID
     * @default "ORCL"
     */
    readonly dbName?: string;
    readonly storage: StorageConfig;
    readonly network: NetworkConfig;
    readonly backup?: BackupConfig;
    readonly optionGroup: OptionGroupConfig;
    readonly skipFinalSnapshot: boolean;
    /**
     * Explicit final snapshot name
     * @default `${resourceIdentifier}-final-snapshot`
     */
    readonly finalSnapshotIdentifier?: string;
    /** @default true */
    readonly deletionProtection?: boolean;
    /** @default false */
    readonly multiAz?: boolean;
    /** @default false */
    readonly performanceInsights?: boolean;
    /** @default true */
    readonly autoMinorVersionUpgrade?: boolean;
    /** @default ["alert", "audit", "listener", "trace"] */
    readonly cloudwatchLogsExports?: OracleLogType[];
    /** @default 30 */
    readonly cloudwatchLogsRetentionDays?: number;
    readonly credentials?: CredentialConfig;
    /** Additional tags */
    readonly tags?: Record<string, string>;
}
