/**
 * @format
 * Environment Configurations
 *
 * Environment identity (account and region) and CLI resolution.
 *
 * Rollout-specific behaviour (schedules, timeouts, cluster tags) belongs in
 * lib/config/rollout/configurations.ts.
 *
 * Environment values use FULL NAMES (development, staging, production);
 * short names (dev, prod) are accepted on the CLI and mapped.
 */

import * as cdk from 'aws-cdk-lib/core';

import { fromEnv } from './env';

// =============================================================================
// ENVIRONMENT ENUM & RESOLUTION
// =============================================================================

/**
 * @example
 * // CLI usage:
 * // npx cdk deploy -c environment=development
 */
export enum Environment {
    DEVELOPMENT = 'development',
    STAGING = 'staging',
    PRODUCTION = 'production',
}

const SHORT_TO_FULL: Record<string, Environment> = {
    dev: Environment.DEVELOPMENT,
    staging: Environment.STAGING,
    prod: Environment.PRODUCTION,
};

// =============================================================================
// ACCOUNT IDENTITY
// =============================================================================

export interface EnvironmentConfig {
    /** AWS account ID for this environment */
    readonly account?: string;
    /** Primary AWS region */
    readonly region: string;
}

/**
 * Accounts come from the deploying credentials (CDK_DEFAULT_ACCOUNT) unless
 * pinned per environment via <ENV>_ACCOUNT_ID.
 */
function environmentConfig(env: Environment): EnvironmentConfig {
    const prefix = env.toUpperCase();
    return {
        account: fromEnv(`${prefix}_ACCOUNT_ID`) ?? fromEnv('CDK_DEFAULT_ACCOUNT'),
        region: fromEnv(`${prefix}_REGION`) ?? fromEnv('CDK_DEFAULT_REGION') ?? 'eu-west-1',
    };
}

/**
 * CDK environment (account + region) for stack props.
 */
export function cdkEnvironment(env: Environment): cdk.Environment {
    const config = environmentConfig(env);
    return {
        account: config.account,
        region: config.region,
    };
}

// =============================================================================
// RESOLUTION
// =============================================================================

function asEnvironment(value: string): Environment | undefined {
    return Object.values(Environment).find((env) => env === value) ?? SHORT_TO_FULL[value];
}

/**
 * Resolve environment from a context value, then ENVIRONMENT, then development.
 *
 * @example
 * resolveEnvironment('dev')  // => Environment.DEVELOPMENT
 * resolveEnvironment('prod') // => Environment.PRODUCTION
 */
export function resolveEnvironment(contextValue?: string): Environment {
    const envValue = contextValue ?? fromEnv('ENVIRONMENT') ?? Environment.DEVELOPMENT;
    const resolved = asEnvironment(envValue);

    if (!resolved) {
        console.warn(`Unknown environment '${envValue}', defaulting to '${Environment.DEVELOPMENT}'`);
        return Environment.DEVELOPMENT;
    }
    return resolved;
}

export function isValidEnvironment(value: string): boolean {
    return asEnvironment(value) !== undefined;
}
