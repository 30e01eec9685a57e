// Common tag definitions
export interface CommonTags {
    Environment: string;
    Project: string;
    Owner?: string;
    CostCenter?: string;
    Application?: string;
}

/**
 * "All IPv4 addresses" range used by the fixed egress rule
 */
export const allIpV4Cidr = "0.0.0.0/0";
