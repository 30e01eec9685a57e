import { EnvParams, params } from 'parameters/environments';
import { Environment } from '@common/parameters/environments';
import { ReplicationMode } from 'lib/types';

/**
 * Production Environment Parameters
 *
 * Two Enterprise Edition primaries with SSL-enabled option group,
 * Multi-AZ, final snapshots and deletion protection.
 */
const prdParams: EnvParams = {
  stackNamePrefix: 'rds-oracle',
  region: 'ap-northeast-1',

  mandatoryTags: {
    Owner: 'platform-team',
    CostCenter: 'db-platform',
  },

  database: {
    identifier: 'orprd',
    instanceCount: 2,
    replication: { mode: ReplicationMode.PRIMARY },
    engine: 'oracle-ee',
    engineVersion: '19.0.0.0.ru-2024-01.rur-2024-01.r1',
    instanceClass: 'db.m6i.xlarge',
    licenseModel: 'bring-your-own-license',
    characterSetName: 'AL32UTF8',
    ncharCharacterSetName: 'AL16UTF16',
    storage: {
      type: 'io1',
      allocatedGB: 200,
      maxAllocatedGB: 1000,
      iops: 3000,
    },
    network: {
      vpcId: 'vpc-0fedcba9876543210',
      ingressRules: [
        { cidrBlock: '10.10.0.0/16', fromPort: 2484, description: 'Oracle TLS from application subnets' },
        { sourceSecurityGroupId: 'sg-0123456789abcdef0', description: 'Oracle access from batch servers' },
      ],
    },
    backup: {
      retentionDays: 14,
      window: '16:00-17:00',
      maintenanceWindow: 'sat:18:00-sat:19:00',
    },
    optionGroup: {
      documentPath: 'parameters/options/oracle-options.json',
      enableSslOption: true,
    },
    skipFinalSnapshot: false,
    finalSnapshotIdentifier: 'orprd-final',
    deletionProtection: true,
    multiAz: true,
    performanceInsights: true,
    autoMinorVersionUpgrade: false,
    cloudwatchLogsRetentionDays: 365,
    credentials: {
      username: 'oraadmin',
      passwordPolicy: { length: 24 },
    },
  },
};

params[Environment.PRODUCTION] = prdParams;
