import * as cdk from 'aws-cdk-lib';
import * as ec2 from 'aws-cdk-lib/aws-ec2';
import * as logs from 'aws-cdk-lib/aws-logs';
import * as rds from 'aws-cdk-lib/aws-rds';
import * as secretsmanager from 'aws-cdk-lib/aws-secretsmanager';
import { Construct } from 'constructs';
import { pascalCase } from 'change-case-commonjs';
import {
  CredentialPlan,
  DeploymentPlan,
  ReplicationMode,
  ResolvedInstancePlan,
  SecurityGroupPlan,
  SecurityRule,
} from 'lib/types';
import { secretPath, toSecretStringGenerator } from 'lib/resolvers/credentials';

export interface OracleDatabaseProps {
  /** Resolved deployment; see resolveDeploymentPlan */
  readonly plan: DeploymentPlan;
}

// Name tags win over any "Name" entry in the shared tag set
const NAME_TAG_PRIORITY = 300;

function nameTag(resource: Construct, name: string): void {
  cdk.Tags.of(resource).add('Name', name, { priority: NAME_TAG_PRIORITY });
}

function ingressProperty(rule: SecurityRule): ec2.CfnSecurityGroup.IngressProperty {
  return {
    ipProtocol: rule.protocol,
    fromPort: rule.fromPort,
    toPort: rule.toPort,
    cidrIp: rule.cidrBlock,
    sourceSecurityGroupId: rule.sourceSecurityGroupId,
    description: rule.description,
  };
}

function egressProperty(rule: SecurityRule): ec2.CfnSecurityGroup.EgressProperty {
  const allProtocols = rule.protocol === '-1';
  return {
    ipProtocol: rule.protocol,
    fromPort: allProtocols ? undefined : rule.fromPort,
    toPort: allProtocols ? undefined : rule.toPort,
    cidrIp: rule.cidrBlock,
    destinationSecurityGroupId: rule.sourceSecurityGroupId,
    description: rule.description,
  };
}

/**
 * Oracle database deployment rendered from a DeploymentPlan:
 * log groups, DB instances, parameter/option/subnet groups, security group,
 * generated master password and one secret-store entry per primary instance.
 */
export class OracleDatabase extends Construct {
  public readonly instances: rds.CfnDBInstance[] = [];
  public readonly parameterGroup: rds.CfnDBParameterGroup;
  public readonly optionGroup?: rds.CfnOptionGroup;
  public readonly subnetGroup?: rds.CfnDBSubnetGroup;
  public readonly securityGroup?: ec2.CfnSecurityGroup;
  public readonly masterPassword?: secretsmanager.Secret;
  public readonly connectionSecrets: secretsmanager.CfnSecret[] = [];

  constructor(scope: Construct, id: string, props: OracleDatabaseProps) {
    super(scope, id);
    const { plan } = props;

    Object.entries(plan.tags).forEach(([key, value]) => cdk.Tags.of(this).add(key, value));

    // ==================================================
    // Shared resources
    this.parameterGroup = new rds.CfnDBParameterGroup(this, 'ParameterGroup', {
      dbParameterGroupName: plan.parameterGroup.name,
      family: plan.parameterGroup.family,
      description: plan.parameterGroup.description,
      parameters: { ...plan.parameterGroup.parameters },
    });
    nameTag(this.parameterGroup, plan.parameterGroup.name);

    if (plan.securityGroup) {
      this.securityGroup = this.createSecurityGroup(plan.securityGroup);
    }
    const securityGroupIds = this.securityGroup ? [this.securityGroup.attrGroupId] : [];

    if (plan.optionGroup) {
      this.optionGroup = new rds.CfnOptionGroup(this, 'OptionGroup', {
        optionGroupName: plan.optionGroup.name,
        optionGroupDescription: plan.optionGroup.description,
        engineName: plan.optionGroup.engineName,
        majorEngineVersion: plan.optionGroup.majorEngineVersion,
        optionConfigurations: plan.optionGroup.options.map((option) => {
          const memberships = [...option.vpcSecurityGroupMemberships, ...securityGroupIds];
          return {
            optionName: option.optionName,
            optionVersion: option.version,
            port: option.port,
            optionSettings: option.settings.length > 0
              ? option.settings.map((setting) => ({ name: setting.name, value: setting.value }))
              : undefined,
            vpcSecurityGroupMemberships: memberships.length > 0 ? memberships : undefined,
          };
        }),
      });
      nameTag(this.optionGroup, plan.optionGroup.name);
    }

    if (plan.subnetGroup) {
      this.subnetGroup = new rds.CfnDBSubnetGroup(this, 'SubnetGroup', {
        dbSubnetGroupName: plan.subnetGroup.name,
        dbSubnetGroupDescription: plan.subnetGroup.description,
        subnetIds: [...plan.subnetGroup.subnetIds],
      });
      nameTag(this.subnetGroup, plan.subnetGroup.name);
    }

    if (plan.credentials) {
      this.masterPassword = new secretsmanager.Secret(this, 'MasterPassword', {
        description: `Generated master password for ${plan.baseIdentifier}`,
        generateSecretString: toSecretStringGenerator(plan.credentials.passwordPolicy, plan.credentials.username),
      });
    }

    // ==================================================
    // DB instances
    for (const instancePlan of plan.instances) {
      const logicalName = pascalCase(instancePlan.resourceIdentifier);
      const instance = new rds.CfnDBInstance(this, logicalName, {
        dbInstanceIdentifier: instancePlan.resourceIdentifier,
        dbInstanceClass: instancePlan.instanceClass,
        port: String(instancePlan.port),
        multiAz: instancePlan.multiAz,
        publiclyAccessible: instancePlan.publiclyAccessible,
        deletionProtection: instancePlan.deletionProtection,
        autoMinorVersionUpgrade: instancePlan.autoMinorVersionUpgrade,
        enablePerformanceInsights: instancePlan.performanceInsights,
        preferredMaintenanceWindow: instancePlan.preferredMaintenanceWindow,
        dbParameterGroupName: this.parameterGroup.ref,
        vpcSecurityGroups: securityGroupIds.length > 0 ? securityGroupIds : undefined,
        enableCloudwatchLogsExports: [...instancePlan.cloudwatchLogsExports],
        copyTagsToSnapshot: true,
        ...this.modeProperties(instancePlan),
      });
      instance.applyRemovalPolicy(
        instancePlan.finalSnapshotIdentifier === null ? cdk.RemovalPolicy.DESTROY : cdk.RemovalPolicy.SNAPSHOT,
      );
      nameTag(instance, instancePlan.resourceIdentifier);

      // Create the log groups up front so RDS does not create them without retention
      plan.logGroups
        .filter((logGroup) => logGroup.instanceIdentifier === instancePlan.resourceIdentifier)
        .forEach((logGroup) => {
          const cfnLogGroup = new logs.CfnLogGroup(this, `${logicalName}${pascalCase(logGroup.logType)}LogGroup`, {
            logGroupName: logGroup.logGroupName,
            retentionInDays: logGroup.retentionInDays,
          });
          instance.node.addDependency(cfnLogGroup);
        });

      this.instances.push(instance);

      new cdk.CfnOutput(this, `${logicalName}EndpointAddress`, {
        value: instance.attrEndpointAddress,
        description: `Endpoint address of ${instancePlan.resourceIdentifier}`,
      });
      if (instancePlan.finalSnapshotIdentifier !== null) {
        new cdk.CfnOutput(this, `${logicalName}FinalSnapshotIdentifier`, {
          value: instancePlan.finalSnapshotIdentifier,
          description: `Name to use for the final snapshot of ${instancePlan.resourceIdentifier}`,
        });
      }

      if (plan.credentials && instancePlan.mode === ReplicationMode.PRIMARY) {
        this.connectionSecrets.push(
          this.createConnectionSecret(logicalName, instance, instancePlan.credentials.dbName, plan.credentials),
        );
      }
    }
  }

  private createSecurityGroup(sgPlan: SecurityGroupPlan): ec2.CfnSecurityGroup {
    const securityGroup = new ec2.CfnSecurityGroup(this, 'SecurityGroup', {
      groupName: sgPlan.name,
      groupDescription: sgPlan.description,
      vpcId: sgPlan.vpcId,
      securityGroupIngress: sgPlan.rules
        .filter((rule) => rule.direction === 'ingress')
        .map(ingressProperty),
      securityGroupEgress: sgPlan.rules
        .filter((rule) => rule.direction === 'egress')
        .map(egressProperty),
    });
    nameTag(securityGroup, sgPlan.name);
    return securityGroup;
  }

  private modeProperties(instancePlan: ResolvedInstancePlan): Partial<rds.CfnDBInstanceProps> {
    switch (instancePlan.mode) {
      case ReplicationMode.PRIMARY: {
        const { engineFields, storage, credentials, backup } = instancePlan;
        if (!this.optionGroup || !this.subnetGroup || !this.masterPassword) {
          throw new Error(`Primary instance ${instancePlan.resourceIdentifier} requires option group, subnet group and master password`);
        }
        return {
          engine: engineFields.engine,
          engineVersion: engineFields.engineVersion,
          licenseModel: engineFields.licenseModel,
          characterSetName: engineFields.characterSetName,
          ncharCharacterSetName: engineFields.ncharCharacterSetName,
          allocatedStorage: String(storage.allocatedStorage),
          maxAllocatedStorage: storage.maxAllocatedStorage,
          storageType: storage.storageType,
          iops: storage.iops,
          storageThroughput: storage.throughput,
          storageEncrypted: storage.encrypted,
          kmsKeyId: storage.kmsKeyId,
          masterUsername: credentials.username,
          masterUserPassword: this.masterPassword.secretValueFromJson('password').unsafeUnwrap(),
          dbName: credentials.dbName,
          optionGroupName: this.optionGroup.ref,
          dbSubnetGroupName: this.subnetGroup.ref,
          backupRetentionPeriod: backup.backupRetentionPeriod,
          preferredBackupWindow: backup.preferredBackupWindow,
        };
      }
      case ReplicationMode.READ_REPLICA:
        return {
          sourceDbInstanceIdentifier: instancePlan.sourceDbInstanceIdentifier,
        };
      case ReplicationMode.CROSS_REGION_REPLICA: {
        const { storage, backup } = instancePlan;
        if (!this.subnetGroup) {
          throw new Error(`Cross-region replica ${instancePlan.resourceIdentifier} requires a subnet group`);
        }
        return {
          sourceDbInstanceIdentifier: instancePlan.sourceDbInstanceArn,
          sourceRegion: instancePlan.sourceRegion,
          allocatedStorage: String(storage.allocatedStorage),
          maxAllocatedStorage: storage.maxAllocatedStorage,
          storageType: storage.storageType,
          iops: storage.iops,
          storageThroughput: storage.throughput,
          storageEncrypted: storage.encrypted,
          kmsKeyId: storage.kmsKeyId,
          dbSubnetGroupName: this.subnetGroup.ref,
          backupRetentionPeriod: backup.backupRetentionPeriod,
          preferredBackupWindow: backup.preferredBackupWindow,
        };
      }
    }
  }

  /**
   * Secret-store entry for one primary instance, stored under its endpoint address.
   */
  private createConnectionSecret(
    logicalName: string,
    instance: rds.CfnDBInstance,
    dbName: string,
    credentials: CredentialPlan,
  ): secretsmanager.CfnSecret {
    if (!this.masterPassword) {
      throw new Error('Master password secret must exist before connection secrets');
    }
    const secret = new secretsmanager.CfnSecret(this, `${logicalName}ConnectionSecret`, {
      name: secretPath(credentials.secretPathPrefix, instance.attrEndpointAddress),
      description: `Connection details for ${instance.dbInstanceIdentifier ?? logicalName}`,
      secretString: cdk.Stack.of(this).toJsonString({
        username: credentials.username,
        password: this.masterPassword.secretValueFromJson('password').unsafeUnwrap(),
        engine: 'oracle',
        host: instance.attrEndpointAddress,
        port: instance.attrEndpointPort,
        dbname: dbName,
      }),
    });
    secret.applyRemovalPolicy(credentials.deleteAllVersions ? cdk.RemovalPolicy.DESTROY : cdk.RemovalPolicy.RETAIN);
    return secret;
  }
}
