import { NamingConventionError } from 'lib/errors';

// Letter first, then letters/digits, single hyphens between them
const RDS_IDENTIFIER_PATTERN = /^[A-Za-z](?:[A-Za-z0-9]|-(?=[A-Za-z0-9]))*$/;
const RDS_IDENTIFIER_MAX_LENGTH = 63;

// Oracle SID
const ORACLE_DB_NAME_PATTERN = /^[A-Za-z][A-Za-z0-9]{0,7}$/;

export function isValidRdsIdentifier(value: string): boolean {
    return value.length <= RDS_IDENTIFIER_MAX_LENGTH && RDS_IDENTIFIER_PATTERN.test(value);
}

/**
 * @throws {NamingConventionError}
 */
export function assertValidRdsIdentifier(value: string, label = 'DB instance identifier'): void {
    if (!isValidRdsIdentifier(value)) {
        throw new NamingConventionError(
            `${label} "${value}" must start with a letter, contain only letters, digits and single hyphens, ` +
            `not end with a hyphen, and be at most ${RDS_IDENTIFIER_MAX_LENGTH} characters`,
            value,
        );
    }
}

/**
 * @throws {NamingConventionError}
 */
export function assertValidDbName(value: string): void {
    if (!ORACLE_DB_NAME_PATTERN.test(value)) {
        throw new NamingConventionError(
            `DB name "${value}" must start with a letter and contain at most 8 letters or digits`,
            value,
        );
    }
}
