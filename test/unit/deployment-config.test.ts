import * as path from 'path';
import * as cdk from 'aws-cdk-lib';
import { Environment } from '@common/parameters/environments';
import { loadCdkContext } from '@common/test-helpers/test-context';
import { ConfigurationError, NamingConventionError } from 'lib/errors';
import {
  loadOptionDocument,
  parseDeploymentConfig,
  parseDeploymentContext,
  resolveDeploymentPlan,
  selectDeploymentConfig,
} from 'lib/resolvers';
import { ReplicationMode } from 'lib/types';
import { params } from 'parameters/environments';
import 'test/parameters';

const envName = Environment.TEST;
const envParams = params[envName];
if (!envParams) {
  throw new Error(`No parameters found for environment: ${envName}`);
}
const typed = envParams.database;
const cdkJsonPath = path.resolve(__dirname, '../../cdk.json');
const baseContext = loadCdkContext(cdkJsonPath);

function configIssues(parse: () => unknown): string[] {
  try {
    parse();
  } catch (error) {
    if (error instanceof ConfigurationError) {
      return error.issues;
    }
    throw error;
  }
  return [];
}

// Flat context form of the typed test parameters
const flatContext = {
  identifier: 'ortest',
  instanceCount: 1,
  engine: 'oracle-se2',
  engineVersion: '19.0.0.0.ru-2024-01.rur-2024-01.r1',
  instanceClass: 'db.t3.medium',
  storage: { type: 'gp3', allocatedGB: 20 },
  network: { vpcId: 'vpc-0a1b2c3d4e5f60718' },
  optionGroup: { documentPath: 'test/fixtures/oracle-options.json' },
  skipFinalSnapshot: true,
};

describe('parseDeploymentConfig', () => {
  test('accepts the test parameters', () => {
    const config = parseDeploymentConfig(typed);
    expect(config.identifier).toBe('ortest');
    expect(config.replication).toEqual({ mode: ReplicationMode.PRIMARY });
  });

  test('ingressRules defaults to an empty list', () => {
    const config = parseDeploymentConfig({ ...typed, network: { vpcId: 'vpc-0a1b2c3d4e5f60718' } });
    expect(config.network.ingressRules).toEqual([]);
  });

  test('unsupported engine is reported by path', () => {
    const issues = configIssues(() => parseDeploymentConfig({ ...typed, engine: 'mysql' }));
    expect(issues).toHaveLength(1);
    expect(issues[0]).toMatch(/^engine: /);
  });

  test.each([0, 10])('instanceCount %p is out of range', (instanceCount) => {
    const issues = configIssues(() => parseDeploymentConfig({ ...typed, instanceCount }));
    expect(issues).toHaveLength(1);
    expect(issues[0]).toMatch(/^instanceCount: /);
  });

  test('ingress rule needs exactly one source', () => {
    const issues = configIssues(() => parseDeploymentConfig({
      ...typed,
      network: {
        vpcId: 'vpc-0a1b2c3d4e5f60718',
        ingressRules: [{ cidrBlock: '10.0.0.0/16', sourceSecurityGroupId: 'sg-0123456789abcdef0' }],
      },
    }));
    expect(issues).toEqual(['network.ingressRules.0: exactly one of cidrBlock or sourceSecurityGroupId is required']);
  });

  test('provisioned IOPS storage needs iops', () => {
    const issues = configIssues(() => parseDeploymentConfig({ ...typed, storage: { type: 'io1', allocatedGB: 100 } }));
    expect(issues).toEqual(['storage.iops: iops is required for io1']);
  });

  test('throughput is only valid for gp3', () => {
    const issues = configIssues(() => parseDeploymentConfig({
      ...typed,
      storage: { type: 'gp2', allocatedGB: 100, throughput: 250 },
    }));
    expect(issues).toEqual(['storage.throughput: throughput is only valid for gp3']);
  });

  test('naming rules are checked after the schema', () => {
    expect(() => parseDeploymentConfig({ ...typed, identifier: 'or_test' })).toThrow(NamingConventionError);
    expect(() => parseDeploymentConfig({ ...typed, dbName: 'TOOLONGSID' })).toThrow(NamingConventionError);
    expect(() => parseDeploymentConfig({ ...typed, skipFinalSnapshot: false, finalSnapshotIdentifier: 'final--1' }))
      .toThrow('Final snapshot identifier "final--1"');
  });

  test('derived final snapshot names must fit the identifier rule', () => {
    const identifier = `o${'a'.repeat(45)}`;
    expect(() => parseDeploymentConfig({ ...typed, identifier, skipFinalSnapshot: false }))
      .toThrow(`Final snapshot identifier "${identifier}-01-final-snapshot"`);

    const finalSnapshotIdentifier = `f${'a'.repeat(60)}`;
    expect(() => parseDeploymentConfig({ ...typed, skipFinalSnapshot: false, finalSnapshotIdentifier }))
      .toThrow(`Final snapshot identifier "${finalSnapshotIdentifier}-01"`);
  });

  test('password policy is validated with the configuration', () => {
    const issues = configIssues(() => parseDeploymentConfig({
      ...typed,
      credentials: { passwordPolicy: { length: 7, overrideSpecial: '@/' } },
    }));
    expect(issues).toEqual([
      'length must be an integer between 8 and 30',
      'overrideSpecial must not contain "/"',
      'overrideSpecial must not contain "@"',
    ]);
  });

  test('log types must not repeat', () => {
    const issues = configIssues(() => parseDeploymentConfig({ ...typed, cloudwatchLogsExports: ['alert', 'alert'] }));
    expect(issues).toEqual(['cloudwatchLogsExports: log types must not repeat']);
  });
});

describe('parseDeploymentContext', () => {
  test('no flags means primary', () => {
    expect(parseDeploymentContext(flatContext).replication).toEqual({ mode: ReplicationMode.PRIMARY });
  });

  test('isReadReplica selects a same-region replica', () => {
    const config = parseDeploymentContext({
      ...flatContext,
      isReadReplica: true,
      sourceDbInstanceIdentifier: 'ortest-01',
    });
    expect(config.replication).toEqual({
      mode: ReplicationMode.READ_REPLICA,
      sourceDbInstanceIdentifier: 'ortest-01',
    });
  });

  test('both flags select a cross-region replica', () => {
    const config = parseDeploymentContext({
      ...flatContext,
      isReadReplica: true,
      isCrossRegion: true,
      sourceDbInstanceArn: 'arn:aws:rds:us-east-1:123456789012:db:ortest-01',
      sourceRegion: 'us-east-1',
      replicaKmsKeyId: 'alias/test-key',
    });
    expect(config.replication).toEqual({
      mode: ReplicationMode.CROSS_REGION_REPLICA,
      sourceDbInstanceArn: 'arn:aws:rds:us-east-1:123456789012:db:ortest-01',
      sourceRegion: 'us-east-1',
      kmsKeyId: 'alias/test-key',
    });
  });

  test('flags are not kept on the result', () => {
    const config = parseDeploymentContext({ ...flatContext, isReadReplica: true, sourceDbInstanceIdentifier: 'x' });
    expect(Object.keys(config)).not.toContain('isReadReplica');
    expect(Object.keys(config)).not.toContain('sourceDbInstanceIdentifier');
  });

  test('isCrossRegion without isReadReplica is a configuration error', () => {
    const issues = configIssues(() => parseDeploymentContext({
      ...flatContext,
      isCrossRegion: true,
      sourceDbInstanceArn: 'arn:aws:rds:us-east-1:123456789012:db:ortest-01',
      sourceRegion: 'us-east-1',
    }));
    expect(issues).toEqual(['isCrossRegion: isCrossRegion requires isReadReplica']);
  });

  test('cross-region replica needs source ARN and region', () => {
    const issues = configIssues(() => parseDeploymentContext({ ...flatContext, isReadReplica: true, isCrossRegion: true }));
    expect(issues).toEqual([
      'sourceDbInstanceArn: sourceDbInstanceArn and sourceRegion are required for a cross-region replica',
    ]);
  });

  test('read replica needs a source identifier', () => {
    const issues = configIssues(() => parseDeploymentContext({ ...flatContext, isReadReplica: true }));
    expect(issues).toEqual(['sourceDbInstanceIdentifier: sourceDbInstanceIdentifier is required for a read replica']);
  });

  test('password policy in the context is validated', () => {
    const issues = configIssues(() => parseDeploymentContext({
      ...flatContext,
      credentials: { passwordPolicy: { minLower: 2 } },
    }));
    expect(issues).toEqual(['minLower must be 0 or 1']);
  });

  test('errors name the context as their source', () => {
    expect(() => parseDeploymentContext({})).toThrow('Invalid database configuration in CDK context');
  });
});

describe('selectDeploymentConfig', () => {
  const app = new cdk.App({ context: baseContext });

  test('database object in the environment context wins', () => {
    const config = selectDeploymentConfig(app.node.tryGetContext(envName), { ...typed, identifier: 'other' });
    expect(config.identifier).toBe('ortest');
  });

  test('typed parameters are used without a context entry', () => {
    expect(selectDeploymentConfig(undefined, typed).identifier).toBe('ortest');
    expect(selectDeploymentConfig({ accountId: '123456789012' }, typed).identifier).toBe('ortest');
  });

  test('context and typed configuration resolve to the same plan', () => {
    const inputs = {
      environment: envName,
      mandatoryTags: { Project: 'TestProject', Environment: envName },
      optionDocument: loadOptionDocument(path.resolve(__dirname, '../fixtures/oracle-options.json')),
      candidateSubnets: [
        { subnetId: 'subnet-aaa', availabilityZone: 'ap-northeast-1a', availableIpAddressCount: 100 },
        { subnetId: 'subnet-ccc', availabilityZone: 'ap-northeast-1c', availableIpAddressCount: 100 },
      ],
    };
    const fromContext = resolveDeploymentPlan(selectDeploymentConfig(app.node.tryGetContext(envName), typed), inputs);
    const fromTyped = resolveDeploymentPlan(parseDeploymentConfig(typed), inputs);
    expect(fromContext).toEqual(fromTyped);
  });
});
