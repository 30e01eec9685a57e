import * as cdk from "aws-cdk-lib";
import { Construct } from "constructs";
import { pascalCase } from "change-case-commonjs";
import { Environment } from "@common/parameters/environments";
import { EnvParams } from 'parameters/environments';
import { OptionDocument, SubnetCandidate } from 'lib/types';
import { RdsOracleStack } from "lib/stacks/rds-oracle-stack";

export interface StageProps extends cdk.StageProps {
    readonly project: string;
    readonly environment: Environment;
    readonly terminationProtection: boolean;
    readonly params: EnvParams;
    readonly optionDocument: OptionDocument;
    readonly candidateSubnets: readonly SubnetCandidate[];
}

/**
 * RDS for Oracle Stage
 */
export class RdsOracleStage extends cdk.Stage {
  public readonly stack: RdsOracleStack;

  constructor(scope: Construct, id: string, props: StageProps) {
    super(scope, id, props);

    const stackNamePrefix = props.params.stackNamePrefix ?? 'rds-oracle';
    this.stack = new RdsOracleStack(this, `${pascalCase(props.project)}${pascalCase(stackNamePrefix)}`, {
        stackName: `${props.project}-${props.environment}-${stackNamePrefix}-stack`,
        description: `Oracle database ${props.params.database.identifier} (${props.params.database.replication.mode})`,
        project: props.project,
        environment: props.environment,
        env: props.env,
        terminationProtection: props.terminationProtection,
        params: props.params,
        optionDocument: props.optionDocument,
        candidateSubnets: props.candidateSubnets,
    });
  }
}
