import * as fs from 'fs';
import { ConfigurationError } from 'lib/errors';
import {
    OptionDocument,
    OptionDocumentSchema,
    OptionEntry,
    OracleEngine,
    ResolvedOption,
} from 'lib/types';

export const DEFAULT_OPTION_PORT = 1521;
export const DEFAULT_SSL_OPTION_PORT = 2484;

/**
 * Validate an already-parsed option document.
 *
 * @param source - Where the document came from, used in error messages
 * @throws {ConfigurationError}
 */
export function parseOptionDocument(raw: unknown, source = 'option document'): OptionDocument {
    const result = OptionDocumentSchema.safeParse(raw);
    if (!result.success) {
        throw new ConfigurationError(
            `Invalid ${source}`,
            result.error.issues.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`),
        );
    }
    return result.data;
}

/**
 * Read and validate the JSON option document once, at load time.
 *
 * @throws {ConfigurationError}
 */
export function loadOptionDocument(documentPath: string): OptionDocument {
    let raw: unknown;
    try {
        raw = JSON.parse(fs.readFileSync(documentPath, 'utf8'));
    } catch (error) {
        const reason = error instanceof Error ? error.message : String(error);
        throw new ConfigurationError(`Cannot read option document ${documentPath}: ${reason}`);
    }
    return parseOptionDocument(raw, `option document ${documentPath}`);
}

function resolveOption(entry: OptionEntry, defaultPort: number): ResolvedOption {
    return {
        optionName: entry.option_name,
        port: entry.port ?? defaultPort,
        ...(entry.version !== undefined ? { version: entry.version } : {}),
        vpcSecurityGroupMemberships: entry.vpc_security_group_memberships ?? [],
        settings: (entry.option_settings ?? []).map((setting) => ({
            name: setting.name,
            value: setting.value,
        })),
    };
}

/**
 * Pick the option list for the option group. Only the option list depends
 * on enableSslOption; see {@link selectParameters} for the parameter list.
 */
export function selectOptions(document: OptionDocument, enableSslOption: boolean): ResolvedOption[] {
    return enableSslOption
        ? document.ssl_option.map((entry) => resolveOption(entry, DEFAULT_SSL_OPTION_PORT))
        : document.option_group_options.map((entry) => resolveOption(entry, DEFAULT_OPTION_PORT));
}

/**
 * Parameter group parameters as a name/value map. Later duplicates win.
 * apply_method is not carried: CloudFormation picks it per parameter.
 */
export function selectParameters(document: OptionDocument): Record<string, string> {
    const parameters: Record<string, string> = {};
    for (const parameter of document.parameter_group_parameters) {
        parameters[parameter.name] = parameter.value;
    }
    return parameters;
}

/**
 * Leading numeric component of an engine version, e.g. "19" for "19.0.0.0.ru-2024-01.rur-2024-01.r1".
 *
 * @throws {ConfigurationError}
 */
export function majorEngineVersion(engineVersion: string): string {
    const match = /^(\d+)(?:\.|$)/.exec(engineVersion);
    if (!match) {
        throw new ConfigurationError(`Cannot derive a major version from engineVersion "${engineVersion}"`);
    }
    return match[1];
}

export function parameterGroupFamily(engine: OracleEngine, engineVersion: string): string {
    return `${engine}-${majorEngineVersion(engineVersion)}`;
}
