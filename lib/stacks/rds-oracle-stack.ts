import * as cdk from 'aws-cdk-lib';
import { Construct } from 'constructs';
import { Environment } from '@common/parameters/environments';
import { EnvParams } from 'parameters/environments';
import { DeploymentPlan, OptionDocument, SubnetCandidate } from 'lib/types';
import { MIN_AVAILABLE_IP_ADDRESSES, resolveDeploymentPlan } from 'lib/resolvers';
import { OracleDatabase } from 'lib/constructs/oracle-database';

export interface RdsOracleStackProps extends cdk.StackProps {
  readonly project: string;
  readonly environment: Environment;
  readonly params: EnvParams;
  /** Validated option document referenced by params.database.optionGroup */
  readonly optionDocument: OptionDocument;
  /** Private subnets found in params.database.network.vpcId */
  readonly candidateSubnets: readonly SubnetCandidate[];
}

export class RdsOracleStack extends cdk.Stack {
  public readonly plan: DeploymentPlan;
  public readonly database: OracleDatabase;

  constructor(scope: Construct, id: string, props: RdsOracleStackProps) {
    super(scope, id, props);

    const { params } = props;

    this.plan = resolveDeploymentPlan(
      { ...params.database, tags: { ...params.tags, ...params.database.tags } },
      {
        environment: props.environment,
        mandatoryTags: {
          ...params.mandatoryTags,
          Project: props.project,
          Environment: props.environment,
        },
        optionDocument: props.optionDocument,
        candidateSubnets: props.candidateSubnets,
      },
    );

    const { subnetGroup } = this.plan;
    if (subnetGroup) {
      const excluded = props.candidateSubnets
        .filter((subnet) => !subnetGroup.subnetIds.includes(subnet.subnetId))
        .map((subnet) => subnet.subnetId);
      if (excluded.length > 0) {
        cdk.Annotations.of(this).addInfo(
          `Excluded subnet(s) with ${MIN_AVAILABLE_IP_ADDRESSES} or fewer available IP addresses: ${excluded.join(', ')}`,
        );
      }
    }

    this.database = new OracleDatabase(this, 'OracleDatabase', { plan: this.plan });
  }
}
