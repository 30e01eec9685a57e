import { z } from 'zod';
import { ConfigurationError } from 'lib/errors';
import {
    DeploymentConfig,
    LICENSE_MODELS,
    ORACLE_ENGINES,
    ORACLE_LOG_TYPES,
    ReplicationConfig,
    ReplicationMode,
    STORAGE_TYPES,
} from 'lib/types';
import { resolvePasswordPolicy } from './credentials';
import { deriveInstanceIdentifiers, MAX_INSTANCE_COUNT } from './identifier';
import { resolveFinalSnapshotIdentifier } from './instance-plan';
import { assertValidDbName, assertValidRdsIdentifier } from './naming';

const port = z.number().int().min(1).max(65535);

const ingressRuleSchema = z.object({
    fromPort: port.optional(),
    toPort: port.optional(),
    protocol: z.string().min(1).optional(),
    cidrBlock: z.string().regex(/^\d{1,3}(\.\d{1,3}){3}\/\d{1,2}$/, 'must be an IPv4 CIDR block').optional(),
    sourceSecurityGroupId: z.string().regex(/^sg-[0-9a-f]+$/, 'must be a security group ID').optional(),
    description: z.string().optional(),
}).superRefine((rule, ctx) => {
    const sources = [rule.cidrBlock, rule.sourceSecurityGroupId].filter((value) => value !== undefined);
    if (sources.length !== 1) {
        ctx.addIssue({
            code: z.ZodIssueCode.custom,
            message: 'exactly one of cidrBlock or sourceSecurityGroupId is required',
        });
    }
    if (rule.fromPort !== undefined && rule.toPort !== undefined && rule.toPort < rule.fromPort) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, path: ['toPort'], message: 'toPort must be >= fromPort' });
    }
});

const storageSchema = z.object({
    type: z.enum(STORAGE_TYPES),
    allocatedGB: z.number().int().min(20).max(65536),
    maxAllocatedGB: z.number().int().max(65536).optional(),
    iops: z.number().int().min(1000).optional(),
    throughput: z.number().int().min(125).optional(),
    encrypted: z.boolean().optional(),
    kmsKeyId: z.string().min(1).optional(),
}).superRefine((storage, ctx) => {
    if ((storage.type === 'io1' || storage.type === 'io2') && storage.iops === undefined) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, path: ['iops'], message: `iops is required for ${storage.type}` });
    }
    if (storage.throughput !== undefined && storage.type !== 'gp3') {
        ctx.addIssue({ code: z.ZodIssueCode.custom, path: ['throughput'], message: 'throughput is only valid for gp3' });
    }
    if (storage.maxAllocatedGB !== undefined && storage.maxAllocatedGB < storage.allocatedGB) {
        ctx.addIssue({
            code: z.ZodIssueCode.custom,
            path: ['maxAllocatedGB'],
            message: 'maxAllocatedGB must be >= allocatedGB',
        });
    }
});

const passwordPolicySchema = z.object({
    length: z.number().int().optional(),
    minLower: z.number().int().optional(),
    minUpper: z.number().int().optional(),
    minNumeric: z.number().int().optional(),
    minSpecial: z.number().int().optional(),
    special: z.boolean().optional(),
    overrideSpecial: z.string().optional(),
});

const sharedFields = {
    identifier: z.string().min(1),
    identifierTemplate: z.string().min(1).optional(),
    instanceCount: z.number().int().min(1).max(MAX_INSTANCE_COUNT),
    engine: z.enum(ORACLE_ENGINES),
    engineVersion: z.string().regex(/^\d+(\.|$)/, 'must start with the major version number'),
    instanceClass: z.string().regex(/^db\.[a-z0-9-]+\.[a-z0-9]+$/, 'must be a DB instance class such as db.m6i.large'),
    licenseModel: z.enum(LICENSE_MODELS).optional(),
    characterSetName: z.string().min(1).optional(),
    ncharCharacterSetName: z.string().min(1).optional(),
    dbName: z.string().min(1).optional(),
    storage: storageSchema,
    network: z.object({
        vpcId: z.string().regex(/^vpc-[0-9a-f]+$/, 'must be a VPC ID').optional(),
        ingressRules: z.array(ingressRuleSchema).default([]),
        port: port.optional(),
        publiclyAccessible: z.boolean().optional(),
    }),
    backup: z.object({
        retentionDays: z.number().int().min(0).max(35),
        window: z.string().regex(/^\d{2}:\d{2}-\d{2}:\d{2}$/, 'must look like hh24:mi-hh24:mi').optional(),
        maintenanceWindow: z.string().min(1).optional(),
    }).optional(),
    optionGroup: z.object({
        documentPath: z.string().min(1),
        enableSslOption: z.boolean().optional(),
    }),
    skipFinalSnapshot: z.boolean(),
    finalSnapshotIdentifier: z.string().min(1).optional(),
    deletionProtection: z.boolean().optional(),
    multiAz: z.boolean().optional(),
    performanceInsights: z.boolean().optional(),
    autoMinorVersionUpgrade: z.boolean().optional(),
    cloudwatchLogsExports: z.array(z.enum(ORACLE_LOG_TYPES))
        .refine((logTypes) => new Set(logTypes).size === logTypes.length, 'log types must not repeat')
        .optional(),
    cloudwatchLogsRetentionDays: z.number().int().min(1).optional(),
    credentials: z.object({
        username: z.string().regex(/^[A-Za-z][A-Za-z0-9_]{0,29}$/, 'must be a valid Oracle user name').optional(),
        passwordPolicy: passwordPolicySchema.optional(),
        secretBasePath: z.string().optional(),
        deleteAllVersions: z.boolean().optional(),
    }).optional(),
    tags: z.record(z.string()).optional(),
};

const replicationSchema = z.discriminatedUnion('mode', [
    z.object({ mode: z.literal(ReplicationMode.PRIMARY) }),
    z.object({
        mode: z.literal(ReplicationMode.READ_REPLICA),
        sourceDbInstanceIdentifier: z.string().min(1),
    }),
    z.object({
        mode: z.literal(ReplicationMode.CROSS_REGION_REPLICA),
        sourceDbInstanceArn: z.string().regex(/^arn:aws[a-z-]*:rds:/, 'must be an RDS instance ARN'),
        sourceRegion: z.string().min(1),
        kmsKeyId: z.string().min(1).optional(),
    }),
]);

export const DeploymentConfigSchema = z.object({
    ...sharedFields,
    replication: replicationSchema,
});

/**
 * Flat form used in cdk.json context: replication is described by two flags.
 */
export const DeploymentContextSchema = z.object({
    ...sharedFields,
    isReadReplica: z.boolean().default(false),
    isCrossRegion: z.boolean().default(false),
    sourceDbInstanceIdentifier: z.string().min(1).optional(),
    sourceDbInstanceArn: z.string().min(1).optional(),
    sourceRegion: z.string().min(1).optional(),
    replicaKmsKeyId: z.string().min(1).optional(),
}).transform((value, ctx) => {
    const {
        isReadReplica,
        isCrossRegion,
        sourceDbInstanceIdentifier,
        sourceDbInstanceArn,
        sourceRegion,
        replicaKmsKeyId,
        ...rest
    } = value;

    let replication: ReplicationConfig;
    if (isCrossRegion) {
        if (!isReadReplica) {
            ctx.addIssue({
                code: z.ZodIssueCode.custom,
                path: ['isCrossRegion'],
                message: 'isCrossRegion requires isReadReplica',
            });
            return z.NEVER;
        }
        if (sourceDbInstanceArn === undefined || sourceRegion === undefined) {
            ctx.addIssue({
                code: z.ZodIssueCode.custom,
                path: ['sourceDbInstanceArn'],
                message: 'sourceDbInstanceArn and sourceRegion are required for a cross-region replica',
            });
            return z.NEVER;
        }
        replication = {
            mode: ReplicationMode.CROSS_REGION_REPLICA,
            sourceDbInstanceArn,
            sourceRegion,
            ...(replicaKmsKeyId !== undefined ? { kmsKeyId: replicaKmsKeyId } : {}),
        };
    } else if (isReadReplica) {
        if (sourceDbInstanceIdentifier === undefined) {
            ctx.addIssue({
                code: z.ZodIssueCode.custom,
                path: ['sourceDbInstanceIdentifier'],
                message: 'sourceDbInstanceIdentifier is required for a read replica',
            });
            return z.NEVER;
        }
        replication = { mode: ReplicationMode.READ_REPLICA, sourceDbInstanceIdentifier };
    } else {
        replication = { mode: ReplicationMode.PRIMARY };
    }
    return { ...rest, replication };
});

function toIssues(error: z.ZodError): string[] {
    return error.issues.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`);
}

/**
 * Naming rules on top of the schema, including every derived instance and
 * final snapshot identifier.
 *
 * @throws {ConfigurationError | NamingConventionError}
 */
export function assertNamingConventions(config: DeploymentConfig): void {
    assertValidRdsIdentifier(config.identifier);
    if (config.dbName !== undefined) {
        assertValidDbName(config.dbName);
    }
    if (config.finalSnapshotIdentifier !== undefined) {
        assertValidRdsIdentifier(config.finalSnapshotIdentifier, 'Final snapshot identifier');
    }
    const identifiers = deriveInstanceIdentifiers(
        config.identifier,
        config.instanceCount,
        config.replication.mode !== ReplicationMode.PRIMARY,
        config.identifierTemplate,
    );
    identifiers.forEach((resourceIdentifier, index) =>
        resolveFinalSnapshotIdentifier(config, resourceIdentifier, index),
    );
}

function assertConfigRules(config: DeploymentConfig): void {
    assertNamingConventions(config);
    resolvePasswordPolicy(config.credentials?.passwordPolicy);
}

/**
 * Validate a typed configuration (e.g. from parameters/*.ts).
 *
 * @throws {ConfigurationError | NamingConventionError}
 */
export function parseDeploymentConfig(raw: unknown): DeploymentConfig {
    const result = DeploymentConfigSchema.safeParse(raw);
    if (!result.success) {
        throw new ConfigurationError('Invalid database configuration', toIssues(result.error));
    }
    const config: DeploymentConfig = result.data;
    assertConfigRules(config);
    return config;
}

/**
 * Validate the flat context form (cdk.json / --context) and convert it to a DeploymentConfig.
 *
 * @throws {ConfigurationError | NamingConventionError}
 */
export function parseDeploymentContext(raw: unknown): DeploymentConfig {
    const result = DeploymentContextSchema.safeParse(raw);
    if (!result.success) {
        throw new ConfigurationError('Invalid database configuration in CDK context', toIssues(result.error));
    }
    const config: DeploymentConfig = result.data;
    assertConfigRules(config);
    return config;
}

/**
 * Pick the configuration of one environment: a "database" object in that
 * environment's CDK context wins over the typed parameters.
 *
 * @param environmentContext - value of tryGetContext(<env>)
 * @throws {ConfigurationError | NamingConventionError}
 */
export function selectDeploymentConfig(environmentContext: unknown, typed: DeploymentConfig): DeploymentConfig {
    if (typeof environmentContext === 'object' && environmentContext !== null && 'database' in environmentContext) {
        return parseDeploymentContext(environmentContext.database);
    }
    return parseDeploymentConfig(typed);
}
