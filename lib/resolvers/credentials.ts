import * as secretsmanager from 'aws-cdk-lib/aws-secretsmanager';
import { Environment } from '@common/parameters/environments';
import { ConfigurationError } from 'lib/errors';
import { CredentialConfig, CredentialPlan, PasswordPolicy, ResolvedPasswordPolicy } from 'lib/types';

export const DEFAULT_MASTER_USERNAME = 'oraadmin';
export const DEFAULT_SECRET_BASE_PATH = 'database';
export const PRODUCTION_SECRET_FOLDER = 'aws-orcl-prod';
export const NON_PRODUCTION_SECRET_FOLDER = 'aws-orcl-nonprod';

export const DEFAULT_PASSWORD_POLICY: ResolvedPasswordPolicy = {
    length: 16,
    minLower: 1,
    minUpper: 1,
    minNumeric: 1,
    minSpecial: 1,
    special: true,
    overrideSpecial: '!#$%&*()-_=+[]{}<>:?',
};

// RDS rejects these in master passwords
const FORBIDDEN_PASSWORD_CHARACTERS = ['/', '@', '"', ' '];
const ASCII_PUNCTUATION = '!"#$%&\'()*+,-./:;<=>?@[\\]^_`{|}~';
const MIN_PASSWORD_LENGTH = 8;
const MAX_PASSWORD_LENGTH = 30;

/**
 * Apply defaults and check the policy can be honoured by Secrets Manager,
 * which guarantees at most one character of each required class.
 *
 * @throws {ConfigurationError}
 */
export function resolvePasswordPolicy(policy: PasswordPolicy = {}): ResolvedPasswordPolicy {
    const resolved: ResolvedPasswordPolicy = {
        length: policy.length ?? DEFAULT_PASSWORD_POLICY.length,
        minLower: policy.minLower ?? DEFAULT_PASSWORD_POLICY.minLower,
        minUpper: policy.minUpper ?? DEFAULT_PASSWORD_POLICY.minUpper,
        minNumeric: policy.minNumeric ?? DEFAULT_PASSWORD_POLICY.minNumeric,
        minSpecial: policy.special === false ? 0 : policy.minSpecial ?? DEFAULT_PASSWORD_POLICY.minSpecial,
        special: policy.special ?? DEFAULT_PASSWORD_POLICY.special,
        overrideSpecial: policy.overrideSpecial ?? DEFAULT_PASSWORD_POLICY.overrideSpecial,
    };

    const issues: string[] = [];
    if (!Number.isInteger(resolved.length)
        || resolved.length < MIN_PASSWORD_LENGTH
        || resolved.length > MAX_PASSWORD_LENGTH) {
        issues.push(`length must be an integer between ${MIN_PASSWORD_LENGTH} and ${MAX_PASSWORD_LENGTH}`);
    }
    const minimums = {
        minLower: resolved.minLower,
        minUpper: resolved.minUpper,
        minNumeric: resolved.minNumeric,
        minSpecial: resolved.minSpecial,
    };
    for (const [name, value] of Object.entries(minimums)) {
        if (value !== 0 && value !== 1) {
            issues.push(`${name} must be 0 or 1`);
        }
    }
    if (policy.special === false && (policy.minSpecial ?? 0) > 0) {
        issues.push('minSpecial requires special characters to be enabled');
    }
    if (resolved.special && resolved.overrideSpecial.length === 0) {
        issues.push('overrideSpecial must not be empty when special characters are enabled');
    }
    for (const char of FORBIDDEN_PASSWORD_CHARACTERS) {
        if (resolved.overrideSpecial.includes(char)) {
            issues.push(`overrideSpecial must not contain ${JSON.stringify(char)}`);
        }
    }
    if (issues.length > 0) {
        throw new ConfigurationError('Invalid password policy', issues);
    }
    return resolved;
}

/**
 * Secrets Manager generation options equivalent to the policy.
 * Punctuation outside overrideSpecial is excluded.
 */
export function toSecretStringGenerator(
    policy: ResolvedPasswordPolicy,
    username: string,
): secretsmanager.SecretStringGenerator {
    const excludedPunctuation = [...ASCII_PUNCTUATION]
        .filter((char) => !policy.special || !policy.overrideSpecial.includes(char))
        .join('');
    const requireEachIncludedType =
        policy.minLower + policy.minUpper + policy.minNumeric + policy.minSpecial > 0;

    return {
        secretStringTemplate: JSON.stringify({ username }),
        generateStringKey: 'password',
        passwordLength: policy.length,
        excludeCharacters: excludedPunctuation,
        excludePunctuation: !policy.special,
        includeSpace: false,
        requireEachIncludedType,
    };
}

export function secretFolder(environment: Environment): string {
    return environment === Environment.PRODUCTION ? PRODUCTION_SECRET_FOLDER : NON_PRODUCTION_SECRET_FOLDER;
}

export function secretPathPrefix(environment: Environment, basePath: string = DEFAULT_SECRET_BASE_PATH): string {
    const trimmed = basePath.replace(/^\/+|\/+$/g, '');
    return trimmed.length > 0 ? `${trimmed}/${secretFolder(environment)}` : secretFolder(environment);
}

/**
 * Full secret-store path of one instance, keyed by its endpoint address.
 */
export function secretPath(prefix: string, address: string): string {
    return `${prefix}/${address}`;
}

export function resolveCredentialPlan(config: CredentialConfig | undefined, environment: Environment): CredentialPlan {
    return {
        username: config?.username ?? DEFAULT_MASTER_USERNAME,
        passwordPolicy: resolvePasswordPolicy(config?.passwordPolicy),
        secretPathPrefix: secretPathPrefix(environment, config?.secretBasePath),
        deleteAllVersions: config?.deleteAllVersions ?? false,
    };
}
