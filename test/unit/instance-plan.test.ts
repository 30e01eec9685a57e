import { Environment } from '@common/parameters/environments';
import { NamingConventionError } from 'lib/errors';
import { DeploymentConfig, ReplicationMode } from 'lib/types';
import { resolveFinalSnapshotIdentifier, resolveInstancePlans, sharedResourceNames } from 'lib/resolvers';
import { params } from 'parameters/environments';
import 'test/parameters';

const envParams = params[Environment.TEST];
if (!envParams) {
  throw new Error(`No parameters found for environment: ${Environment.TEST}`);
}
const primary: DeploymentConfig = envParams.database;

const readReplica: DeploymentConfig = {
  ...primary,
  replication: { mode: ReplicationMode.READ_REPLICA, sourceDbInstanceIdentifier: 'ortest-01' },
  identifierTemplate: 'ortest-I-rr',
};

const crossRegion: DeploymentConfig = {
  ...primary,
  instanceCount: 1,
  replication: {
    mode: ReplicationMode.CROSS_REGION_REPLICA,
    sourceDbInstanceArn: 'arn:aws:rds:us-east-1:123456789012:db:ortest-01',
    sourceRegion: 'us-east-1',
    kmsKeyId: 'arn:aws:kms:ap-northeast-1:123456789012:key/test-key',
  },
  storage: { ...primary.storage, kmsKeyId: 'arn:aws:kms:us-east-1:123456789012:key/source-key' },
};

describe('sharedResourceNames', () => {
  test('lowercased identifier with fixed suffixes', () => {
    expect(sharedResourceNames('OrTest')).toEqual({
      parameterGroupName: 'ortest-pg',
      optionGroupName: 'ortest-og',
      subnetGroupName: 'ortest-sng',
    });
  });
});

describe('resolveFinalSnapshotIdentifier', () => {
  test('skipped final snapshot has no name', () => {
    expect(resolveFinalSnapshotIdentifier({ skipFinalSnapshot: true, instanceCount: 1 }, 'ordb', 0)).toBeNull();
  });

  test('default name is derived from the instance identifier', () => {
    expect(resolveFinalSnapshotIdentifier({ skipFinalSnapshot: false, instanceCount: 2 }, 'ordb-02', 1)).toBe(
      'ordb-02-final-snapshot',
    );
  });

  test('explicit name is suffixed only when there are several instances', () => {
    const single = { skipFinalSnapshot: false, instanceCount: 1, finalSnapshotIdentifier: 'ordb-last' };
    const several = { ...single, instanceCount: 3 };
    expect(resolveFinalSnapshotIdentifier(single, 'ordb', 0)).toBe('ordb-last');
    expect(resolveFinalSnapshotIdentifier(several, 'ordb-03', 2)).toBe('ordb-last-03');
  });

  test('suffixed name longer than 63 characters is rejected', () => {
    const config = { skipFinalSnapshot: false, instanceCount: 2, finalSnapshotIdentifier: `f${'a'.repeat(60)}` };
    expect(() => resolveFinalSnapshotIdentifier(config, 'ordb-01', 0)).toThrow(NamingConventionError);
  });
});

describe('resolveInstancePlans', () => {
  describe('primary', () => {
    const plans = resolveInstancePlans(primary);

    test('one plan per instance with derived identifiers', () => {
      expect(plans.map((plan) => plan.resourceIdentifier)).toEqual(['ortest-01', 'ortest-02']);
      expect(plans.map((plan) => plan.index)).toEqual([0, 1]);
    });

    test('engine, storage, credential and backup fields are set', () => {
      const [first] = plans;
      if (first.mode !== ReplicationMode.PRIMARY) {
        throw new Error('expected a primary plan');
      }
      expect(first.engineFields).toEqual({
        engine: 'oracle-se2',
        engineVersion: '19.0.0.0.ru-2024-01.rur-2024-01.r1',
        licenseModel: 'license-included',
      });
      expect(first.storage).toEqual({ storageType: 'gp3', allocatedStorage: 20, encrypted: true });
      expect(first.credentials).toEqual({ username: 'oraadmin', dbName: 'ORCL' });
      expect(first.backup).toEqual({ backupRetentionPeriod: 3 });
      expect(first.optionGroupName).toBe('ortest-og');
      expect(first.subnetGroupName).toBe('ortest-sng');
    });

    test('common defaults', () => {
      expect(plans[0]).toMatchObject({
        instanceClass: 'db.t3.medium',
        port: 1521,
        multiAz: false,
        publiclyAccessible: false,
        deletionProtection: false,
        autoMinorVersionUpgrade: true,
        performanceInsights: false,
        parameterGroupName: 'ortest-pg',
        cloudwatchLogsExports: ['alert', 'audit', 'listener', 'trace'],
        finalSnapshotIdentifier: null,
      });
    });

    test('single primary keeps the base identifier', () => {
      const [only] = resolveInstancePlans({ ...primary, instanceCount: 1 });
      expect(only.resourceIdentifier).toBe('ortest');
    });
  });

  describe('read replica', () => {
    const plans = resolveInstancePlans(readReplica);

    test('identifiers come from the template', () => {
      expect(plans.map((plan) => plan.resourceIdentifier)).toEqual(['ortest-01-rr', 'ortest-02-rr']);
    });

    test('only the source identifier is set; everything else is null', () => {
      expect(plans[0]).toMatchObject({
        mode: ReplicationMode.READ_REPLICA,
        sourceDbInstanceIdentifier: 'ortest-01',
        engineFields: null,
        storage: null,
        credentials: null,
        optionGroupName: null,
        subnetGroupName: null,
        backup: null,
      });
    });
  });

  describe('cross-region replica', () => {
    const [plan] = resolveInstancePlans(crossRegion);

    test('a single replica is still suffixed', () => {
      expect(plan.resourceIdentifier).toBe('ortest-01');
    });

    test('source, storage and subnet group are set; engine and credentials are null', () => {
      expect(plan).toMatchObject({
        mode: ReplicationMode.CROSS_REGION_REPLICA,
        sourceDbInstanceArn: 'arn:aws:rds:us-east-1:123456789012:db:ortest-01',
        sourceRegion: 'us-east-1',
        engineFields: null,
        credentials: null,
        optionGroupName: null,
        subnetGroupName: 'ortest-sng',
        backup: { backupRetentionPeriod: 3 },
      });
    });

    test('replica KMS key wins over the storage key', () => {
      expect(plan.storage?.kmsKeyId).toBe('arn:aws:kms:ap-northeast-1:123456789012:key/test-key');
    });

    test('storage key is used when no replica key is given', () => {
      const [withoutReplicaKey] = resolveInstancePlans({
        ...crossRegion,
        replication: {
          mode: ReplicationMode.CROSS_REGION_REPLICA,
          sourceDbInstanceArn: 'arn:aws:rds:us-east-1:123456789012:db:ortest-01',
          sourceRegion: 'us-east-1',
        },
      });
      expect(withoutReplicaKey.storage?.kmsKeyId).toBe('arn:aws:kms:us-east-1:123456789012:key/source-key');
    });
  });
});
