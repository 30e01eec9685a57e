import { Environment } from '@common/parameters/environments';
import { mergeTags } from '@common/helpers/mandatory-tags';
import { CommonTags } from '@common/types';
import {
    DeploymentConfig,
    DeploymentPlan,
    LogGroupPlan,
    OptionDocument,
    ReplicationMode,
    ResolvedInstancePlan,
    SubnetCandidate,
} from 'lib/types';
import { resolveCredentialPlan } from './credentials';
import { resolveInstancePlans, sharedResourceNames } from './instance-plan';
import { parameterGroupFamily, majorEngineVersion, selectOptions, selectParameters } from './option-document';
import { expandSecurityRules } from './security-rules';
import { selectEligibleSubnets } from './subnet-filter';

export const DEFAULT_LOG_RETENTION_DAYS = 30;

export interface DeploymentPlanInputs {
    readonly environment: Environment;
    /** Tagging convention, merged over config.tags on every resource */
    readonly mandatoryTags: CommonTags;
    /** Validated option document (see loadOptionDocument) */
    readonly optionDocument: OptionDocument;
    /** Private subnets of the VPC; unused for same-region read replicas */
    readonly candidateSubnets: readonly SubnetCandidate[];
}

/**
 * Whether the deployment builds its own DB subnet group.
 */
export function needsSubnetGroup(config: Pick<DeploymentConfig, 'replication'>): boolean {
    return config.replication.mode !== ReplicationMode.READ_REPLICA;
}

export function logGroupName(instanceIdentifier: string, logType: string): string {
    return `/aws/rds/instance/${instanceIdentifier}/${logType}`;
}

function resolveLogGroups(instances: readonly ResolvedInstancePlan[], retentionInDays: number): LogGroupPlan[] {
    return instances.flatMap((instance) =>
        instance.cloudwatchLogsExports.map((logType) => ({
            instanceIdentifier: instance.resourceIdentifier,
            logType,
            logGroupName: logGroupName(instance.resourceIdentifier, logType),
            retentionInDays,
        })),
    );
}

/**
 * Resolve a whole deployment in one synchronous pass.
 *
 * @throws {ConfigurationError | NamingConventionError | NoEligibleSubnetsError}
 */
export function resolveDeploymentPlan(config: DeploymentConfig, inputs: DeploymentPlanInputs): DeploymentPlan {
    const names = sharedResourceNames(config.identifier);
    const instances = resolveInstancePlans(config, names);
    const mode = config.replication.mode;
    const isPrimary = mode === ReplicationMode.PRIMARY;
    const baseIdentifier = config.identifier.toLowerCase();

    const subnetGroup = needsSubnetGroup(config)
        ? {
            name: names.subnetGroupName,
            description: `Subnet group for ${config.identifier}`,
            subnetIds: selectEligibleSubnets(inputs.candidateSubnets).map((subnet) => subnet.subnetId),
        }
        : null;

    const optionGroup = isPrimary
        ? {
            name: names.optionGroupName,
            engineName: config.engine,
            majorEngineVersion: majorEngineVersion(config.engineVersion),
            description: `Option group for ${config.identifier}`,
            options: selectOptions(inputs.optionDocument, config.optionGroup.enableSslOption ?? false),
        }
        : null;

    const securityGroup = config.network.vpcId !== undefined
        ? {
            name: `${baseIdentifier}-sg`,
            vpcId: config.network.vpcId,
            description: `Security group for ${config.identifier}`,
            rules: expandSecurityRules(config.network.ingressRules),
        }
        : null;

    const plan: DeploymentPlan = {
        mode,
        baseIdentifier,
        instances,
        parameterGroup: {
            name: names.parameterGroupName,
            family: parameterGroupFamily(config.engine, config.engineVersion),
            description: `Parameter group for ${config.identifier}`,
            parameters: selectParameters(inputs.optionDocument),
        },
        optionGroup,
        subnetGroup,
        securityGroup,
        logGroups: resolveLogGroups(instances, config.cloudwatchLogsRetentionDays ?? DEFAULT_LOG_RETENTION_DAYS),
        credentials: isPrimary ? resolveCredentialPlan(config.credentials, inputs.environment) : null,
        tags: mergeTags(inputs.mandatoryTags, config.tags),
    };
    return deepFreeze(plan);
}

function deepFreeze<T>(value: T): T {
    if (typeof value === 'object' && value !== null && !Object.isFrozen(value)) {
        Object.freeze(value);
        Object.values(value).forEach((child) => deepFreeze(child));
    }
    return value;
}
