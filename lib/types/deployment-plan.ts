import {
    LicenseModel,
    OracleEngine,
    OracleLogType,
    PasswordPolicy,
    ReplicationMode,
    StorageType,
} from './oracle-database';

export interface EngineFields {
    readonly engine: OracleEngine;
    readonly engineVersion: string;
    readonly licenseModel: LicenseModel;
    readonly characterSetName?: string;
    readonly ncharCharacterSetName?: string;
}

export interface StorageFields {
    readonly storageType: StorageType;
    readonly allocatedStorage: number;
    readonly maxAllocatedStorage?: number;
    readonly iops?: number;
    readonly throughput?: number;
    readonly encrypted: boolean;
    readonly kmsKeyId?: string;
}

export interface CredentialFields {
    readonly username: string;
    readonly dbName: string;
}

export interface BackupFields {
    readonly backupRetentionPeriod: number;
    readonly preferredBackupWindow?: string;
}

interface InstancePlanBase {
    /** 0-based position within the deployment */
    readonly index: number;
    readonly resourceIdentifier: string;
    readonly instanceClass: string;
    readonly port: number;
    readonly multiAz: boolean;
    readonly publiclyAccessible: boolean;
    readonly deletionProtection: boolean;
    readonly autoMinorVersionUpgrade: boolean;
    readonly performanceInsights: boolean;
    readonly preferredMaintenanceWindow?: string;
    readonly parameterGroupName: string;
    readonly cloudwatchLogsExports: OracleLogType[];
    /** null when the final snapshot is skipped */
    readonly finalSnapshotIdentifier: string | null;
}

export interface PrimaryInstancePlan extends InstancePlanBase {
    readonly mode: ReplicationMode.PRIMARY;
    readonly engineFields: EngineFields;
    readonly storage: StorageFields;
    readonly credentials: CredentialFields;
    readonly optionGroupName: string;
    readonly subnetGroupName: string;
    readonly backup: BackupFields;
}

export interface ReadReplicaInstancePlan extends InstancePlanBase {
    readonly mode: ReplicationMode.READ_REPLICA;
    readonly sourceDbInstanceIdentifier: string;
    readonly engineFields: null;
    readonly storage: null;
    readonly credentials: null;
    readonly optionGroupName: null;
    readonly subnetGroupName: null;
    readonly backup: null;
}

export interface CrossRegionReplicaInstancePlan extends InstancePlanBase {
    readonly mode: ReplicationMode.CROSS_REGION_REPLICA;
    readonly sourceDbInstanceArn: string;
    readonly sourceRegion: string;
    readonly engineFields: null;
    readonly storage: StorageFields;
    readonly credentials: null;
    readonly optionGroupName: null;
    readonly subnetGroupName: string;
    readonly backup: BackupFields;
}

export type ResolvedInstancePlan =
    | PrimaryInstancePlan
    | ReadReplicaInstancePlan
    | CrossRegionReplicaInstancePlan;

export interface SubnetCandidate {
    readonly subnetId: string;
    readonly availabilityZone: string;
    readonly availableIpAddressCount: number;
}

export interface ResolvedOptionSetting {
    readonly name: string;
    readonly value: string;
}

export interface ResolvedOption {
    readonly optionName: string;
    readonly port: number;
    readonly version?: string;
    readonly vpcSecurityGroupMemberships: string[];
    readonly settings: ResolvedOptionSetting[];
}

export interface ParameterGroupPlan {
    readonly name: string;
    readonly family: string;
    readonly description: string;
    readonly parameters: Record<string, string>;
}

export interface OptionGroupPlan {
    readonly name: string;
    readonly engineName: OracleEngine;
    readonly majorEngineVersion: string;
    readonly description: string;
    readonly options: ResolvedOption[];
}

export interface SubnetGroupPlan {
    readonly name: string;
    readonly description: string;
    readonly subnetIds: string[];
}

export type RuleDirection = 'ingress' | 'egress';

export interface SecurityRule {
    readonly direction: RuleDirection;
    readonly protocol: string;
    readonly fromPort: number;
    readonly toPort: number;
    readonly cidrBlock?: string;
    readonly sourceSecurityGroupId?: string;
    readonly description: string;
}

export interface SecurityGroupPlan {
    readonly name: string;
    readonly vpcId: string;
    readonly description: string;
    readonly rules: SecurityRule[];
}

export interface LogGroupPlan {
    readonly instanceIdentifier: string;
    readonly logType: OracleLogType;
    readonly logGroupName: string;
    readonly retentionInDays: number;
}

export interface ResolvedPasswordPolicy extends Required<Omit<PasswordPolicy, 'overrideSpecial'>> {
    readonly overrideSpecial: string;
}

export interface CredentialPlan {
    readonly username: string;
    readonly passwordPolicy: ResolvedPasswordPolicy;
    /** Secret path up to (excluding) the instance address */
    readonly secretPathPrefix: string;
    readonly deleteAllVersions: boolean;
}

/**
 * Everything needed to render one deployment, derived once and never mutated
 */
export interface DeploymentPlan {
    readonly mode: ReplicationMode;
    readonly baseIdentifier: string;
    readonly instances: ResolvedInstancePlan[];
    readonly parameterGroup: ParameterGroupPlan;
    readonly optionGroup: OptionGroupPlan | null;
    readonly subnetGroup: SubnetGroupPlan | null;
    readonly securityGroup: SecurityGroupPlan | null;
    readonly logGroups: LogGroupPlan[];
    readonly credentials: CredentialPlan | null;
    readonly tags: Record<string, string>;
}
