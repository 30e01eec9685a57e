import { DeploymentConfig, CommonTags } from 'lib/types';
import { Environment, EnvironmentConfig } from "@common/parameters/environments";

/**
 * Environment parameters type
 */
export interface EnvParams extends EnvironmentConfig {
    /** Database deployment, used unless the CDK context carries a "database" object */
    readonly database: DeploymentConfig;
    /** Optional mandatory tags; Project and Environment come from the app */
    readonly mandatoryTags?: Omit<CommonTags, 'Project' | 'Environment'>;
}

// Object to store parameters for each environment
export const params: Partial<Record<Environment, EnvParams>> = {};
