import { DescribeSubnetsCommand, EC2Client, Subnet } from '@aws-sdk/client-ec2';
import { ExternalDependencyError } from 'lib/errors';
import { PRIVATE_SUBNET_TAG } from 'lib/resolvers/subnet-filter';
import { SubnetCandidate } from 'lib/types';

/**
 * Source of candidate subnets for the DB subnet group.
 */
export interface SubnetLookup {
  findPrivateSubnets(vpcId: string): Promise<SubnetCandidate[]>;
}

/**
 * Looks up subnets tagged Network=Private in a VPC with EC2 DescribeSubnets.
 * Failures are reported as they are; nothing is retried.
 */
export class Ec2SubnetLookup implements SubnetLookup {
  constructor(private readonly client: Pick<EC2Client, 'send'>) {}

  async findPrivateSubnets(vpcId: string): Promise<SubnetCandidate[]> {
    const subnets: SubnetCandidate[] = [];
    let nextToken: string | undefined;

    do {
      let page: { Subnets?: Subnet[]; NextToken?: string };
      try {
        page = await this.client.send(
          new DescribeSubnetsCommand({
            Filters: [
              { Name: 'vpc-id', Values: [vpcId] },
              { Name: `tag:${PRIVATE_SUBNET_TAG.key}`, Values: [PRIVATE_SUBNET_TAG.value] },
            ],
            NextToken: nextToken,
          }),
        );
      } catch (error) {
        const original = error instanceof Error ? error : new Error(String(error));
        throw new ExternalDependencyError(original.message, original);
      }

      for (const subnet of page.Subnets ?? []) {
        subnets.push(this.mapSubnet(subnet));
      }
      nextToken = page.NextToken;
    } while (nextToken);

    return subnets;
  }

  private mapSubnet(subnet: Subnet): SubnetCandidate {
    return {
      subnetId: subnet.SubnetId || '',
      availabilityZone: subnet.AvailabilityZone || '',
      availableIpAddressCount: subnet.AvailableIpAddressCount || 0,
    };
  }
}
