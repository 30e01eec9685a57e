import { allIpV4Cidr } from '@common/types';
import { IngressRuleConfig, SecurityRule } from 'lib/types';

export const DEFAULT_ORACLE_PORT = 1521;
export const DEFAULT_PROTOCOL = 'tcp';

export const ALLOW_ALL_EGRESS: SecurityRule = {
    direction: 'egress',
    protocol: '-1',
    fromPort: 0,
    toPort: 0,
    cidrBlock: allIpV4Cidr,
    description: 'Allow all outbound traffic',
};

function describeIngress(rule: IngressRuleConfig, fromPort: number, toPort: number): string {
    if (rule.description) {
        return rule.description;
    }
    const source = rule.cidrBlock ?? rule.sourceSecurityGroupId ?? 'unknown';
    const ports = fromPort === toPort ? `${fromPort}` : `${fromPort}-${toPort}`;
    return `Oracle access from ${source} on ${ports}`;
}

/**
 * One ingress rule per configured entry (port 1521 and tcp unless set),
 * followed by the single allow-all egress rule.
 */
export function expandSecurityRules(ingressRules: readonly IngressRuleConfig[]): SecurityRule[] {
    const ingress = ingressRules.map((rule): SecurityRule => {
        const fromPort = rule.fromPort ?? DEFAULT_ORACLE_PORT;
        const toPort = rule.toPort ?? rule.fromPort ?? DEFAULT_ORACLE_PORT;
        return {
            direction: 'ingress',
            protocol: rule.protocol ?? DEFAULT_PROTOCOL,
            fromPort,
            toPort,
            ...(rule.cidrBlock !== undefined ? { cidrBlock: rule.cidrBlock } : {}),
            ...(rule.sourceSecurityGroupId !== undefined
                ? { sourceSecurityGroupId: rule.sourceSecurityGroupId }
                : {}),
            description: describeIngress(rule, fromPort, toPort),
        };
    });
    return [...ingress, ALLOW_ALL_EGRESS];
}
