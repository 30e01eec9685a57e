import { EnvParams, params } from 'parameters/environments';
import { Environment } from '@common/parameters/environments';
import { ReplicationMode } from 'lib/types';

/**
 * Development Environment Parameters
 *
 * This configuration creates:
 * - One Oracle SE2 primary instance in the private subnets of the VPC
 * - Parameter group and option group from options/oracle-options.json
 * - Generated master password and a secret-store entry under aws-orcl-nonprod
 *
 * Configuration optimized for:
 * - Cost (single AZ, small instance class)
 * - Easy teardown (no final snapshot, no deletion protection)
 */
const devParams: EnvParams = {
  // Stack name prefix
  stackNamePrefix: 'rds-oracle',
  region: 'ap-northeast-1',

  mandatoryTags: {
    Owner: 'platform-team',
  },

  database: {
    identifier: 'ordev',
    instanceCount: 1,
    replication: { mode: ReplicationMode.PRIMARY },
    engine: 'oracle-se2',
    engineVersion: '19.0.0.0.ru-2024-01.rur-2024-01.r1',
    instanceClass: 'db.t3.medium',
    licenseModel: 'license-included',
    characterSetName: 'AL32UTF8',
    storage: {
      type: 'gp3',
      allocatedGB: 20,
      maxAllocatedGB: 100,
    },
    network: {
      vpcId: 'vpc-0123456789abcdef0',
      ingressRules: [
        { cidrBlock: '10.0.0.0/16', description: 'Oracle access from the VPC' },
      ],
    },
    backup: {
      retentionDays: 1,
      window: '17:00-18:00',
      maintenanceWindow: 'sun:18:00-sun:19:00',
    },
    optionGroup: {
      documentPath: 'parameters/options/oracle-options.json',
    },
    skipFinalSnapshot: true,
    deletionProtection: false,
    cloudwatchLogsRetentionDays: 7,
    credentials: {
      deleteAllVersions: true,
    },
    tags: {
      Application: 'oracle',
    },
  },
};

// Register in the params object
params[Environment.DEVELOPMENT] = devParams;
