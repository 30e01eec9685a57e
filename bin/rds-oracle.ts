#!/usr/bin/env node
import * as path from 'path';
import * as cdk from 'aws-cdk-lib';
import { EC2Client } from '@aws-sdk/client-ec2';
import { pascalCase } from 'change-case-commonjs';
import { params } from 'parameters/environments';
import { RdsOracleStage } from 'lib/stages/rds-oracle-stage';
import { Environment, isEnvironment } from '@common/parameters/environments';
import { validateDeployment } from '@common/helpers/validate-deployment';
import { ConfigurationError } from 'lib/errors';
import { Ec2SubnetLookup } from 'lib/lookups/ec2-subnet-lookup';
import {
  deriveInstanceIdentifiers,
  loadOptionDocument,
  needsSubnetGroup,
  selectDeploymentConfig,
} from 'lib/resolvers';
import { ReplicationMode, SubnetCandidate } from 'lib/types';
import 'parameters';

async function main(): Promise<void> {
  const app = new cdk.App();

  // Get environment (specified in cdk.json context or at runtime with --context)
  const pjName: string = app.node.tryGetContext('project');
  const envContext: unknown = app.node.tryGetContext('env') || Environment.DEVELOPMENT;
  if (!isEnvironment(envContext)) {
    throw new ConfigurationError(`Unknown environment: ${String(envContext)}`);
  }
  const envName = envContext;

  const envParams = params[envName];
  if (!envParams) {
    throw new Error(`No parameters found for environment: ${envName}`);
  }

  const database = selectDeploymentConfig(app.node.tryGetContext(envName), envParams.database);
  const identifiers = deriveInstanceIdentifiers(
    database.identifier,
    database.instanceCount,
    database.replication.mode !== ReplicationMode.PRIMARY,
    database.identifierTemplate,
  );

  validateDeployment(pjName, envName, envParams.accountId, [
    `Replication: ${database.replication.mode}`,
    `Engine: ${database.engine} ${database.engineVersion}`,
    ...identifiers.map((identifier) => `Instance: ${identifier} (${database.instanceClass})`),
  ]);

  const defaultEnv = {
    account: process.env.CDK_DEFAULT_ACCOUNT || envParams.accountId,
    region: process.env.CDK_DEFAULT_REGION || envParams.region,
  };

  const optionDocument = loadOptionDocument(path.resolve(__dirname, '..', database.optionGroup.documentPath));

  let candidateSubnets: SubnetCandidate[] = [];
  if (needsSubnetGroup(database)) {
    const vpcId = database.network.vpcId;
    if (vpcId === undefined) {
      throw new ConfigurationError('network.vpcId is required to build the DB subnet group');
    }
    const lookup = new Ec2SubnetLookup(new EC2Client({ region: defaultEnv.region }));
    candidateSubnets = await lookup.findPrivateSubnets(vpcId);
    console.log(`Found ${candidateSubnets.length} private subnet(s) in ${vpcId}`);
  }

  // Before you can use cdk destroy to delete a deletion-protected stack,
  // you must disable deletion protection for the stack in the management console.
  const isTerminationProtection = envName === Environment.PRODUCTION;

  new RdsOracleStage(app, `${pascalCase(envName)}`, {
    project: pjName,
    environment: envName,
    env: defaultEnv,
    terminationProtection: isTerminationProtection,
    params: { ...envParams, database },
    optionDocument,
    candidateSubnets,
  });

  // --------------------------------- Tagging  -------------------------------------
  cdk.Tags.of(app).add('Project', pjName);
  cdk.Tags.of(app).add('Environment', envName);
}

main().catch((error: unknown) => {
  console.error(error instanceof Error ? `${error.name}: ${error.message}` : error);
  process.exitCode = 1;
});
