import { NoEligibleSubnetsError } from 'lib/errors';
import { SubnetCandidate } from 'lib/types';

/** Subnets must have strictly more free addresses than this */
export const MIN_AVAILABLE_IP_ADDRESSES = 5;

/** Tag filter applied when looking up candidate subnets */
export const PRIVATE_SUBNET_TAG = { key: 'Network', value: 'Private' } as const;

export function filterSubnetsByAvailableIps(
    subnets: readonly SubnetCandidate[],
    threshold: number = MIN_AVAILABLE_IP_ADDRESSES,
): SubnetCandidate[] {
    return subnets.filter((subnet) => subnet.availableIpAddressCount > threshold);
}

/**
 * Filter candidates and fail when nothing is left to build a subnet group from.
 *
 * @throws {NoEligibleSubnetsError}
 */
export function selectEligibleSubnets(
    subnets: readonly SubnetCandidate[],
    threshold: number = MIN_AVAILABLE_IP_ADDRESSES,
): SubnetCandidate[] {
    const eligible = filterSubnetsByAvailableIps(subnets, threshold);
    if (eligible.length === 0) {
        throw new NoEligibleSubnetsError(threshold, subnets.length);
    }
    return eligible;
}
