import { ConfigurationError } from 'lib/errors';
import { assertValidRdsIdentifier } from './naming';

export const IDENTIFIER_PLACEHOLDER = '-I';

/**
 * Suffixes are "-0" + (index + 1). Two-digit indices have no defined form,
 * so deployments are capped at nine instances.
 */
export const MAX_INSTANCE_COUNT = 9;

export function instanceSuffix(index: number): string {
    return `-0${index + 1}`;
}

export function defaultIdentifierTemplate(identifier: string): string {
    return `${identifier}${IDENTIFIER_PLACEHOLDER}`;
}

/**
 * Derive the DB instance identifier of every instance in a deployment.
 *
 * With more than one instance, or for a replica, every "-I" in the template is
 * replaced with the instance suffix; otherwise the base identifier is used unchanged.
 *
 * @example
 * deriveInstanceIdentifiers('ordb', 2, false) // ['ordb-01', 'ordb-02']
 * deriveInstanceIdentifiers('ordb', 1, true, 'ordb-I-dr') // ['ordb-01-dr']
 */
export function deriveInstanceIdentifiers(
    identifier: string,
    instanceCount: number,
    isReplica: boolean,
    template: string = defaultIdentifierTemplate(identifier),
): string[] {
    if (!Number.isInteger(instanceCount) || instanceCount < 1 || instanceCount > MAX_INSTANCE_COUNT) {
        throw new ConfigurationError(
            `instanceCount must be an integer between 1 and ${MAX_INSTANCE_COUNT}, got ${instanceCount}`,
        );
    }
    assertValidRdsIdentifier(identifier);

    if (instanceCount === 1 && !isReplica) {
        return [identifier];
    }

    if (!template.includes(IDENTIFIER_PLACEHOLDER)) {
        throw new ConfigurationError(
            `identifierTemplate "${template}" must contain "${IDENTIFIER_PLACEHOLDER}" ` +
            'when more than one instance or a replica is deployed',
        );
    }

    return Array.from({ length: instanceCount }, (_, index) => {
        const resolved = template.replaceAll(IDENTIFIER_PLACEHOLDER, instanceSuffix(index));
        assertValidRdsIdentifier(resolved, 'Derived DB instance identifier');
        return resolved;
    });
}
