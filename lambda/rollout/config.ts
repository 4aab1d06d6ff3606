/**
 * @format
 * Rollout Lambda configuration
 *
 * Environment Variables:
 * - STATE_TABLE_NAME: DynamoDB table holding rollout and source records (required)
 * - AMI_PARAMETER_NAME: SSM parameter the Image Builder distribution writes (required)
 * - CLUSTER_TAGS: JSON list of { Key, Value } pairs or a flat object (default: match all)
 * - CONCURRENCY_LIMIT: node groups updated in parallel (default: 4)
 * - ROLLOUT_TIMEOUT_SECONDS: wait for one node group update (default: 3600)
 * - STALE_IN_PROGRESS_SECONDS: age after which InProgress is reset (default: 7200)
 * - POLL_MIN_DELAY_SECONDS / POLL_MAX_DELAY_SECONDS: DescribeUpdate backoff (default: 30 / 120)
 * - NODE_OS_FAMILY: AL2 | AL2023, selects the user data format (default: AL2023)
 * - ALERT_TOPIC_ARN: SNS topic for failure alerts (optional)
 */

import { ClusterTag, ClusterTagFilter } from './types';

export enum NodeOsFamily {
    AL2 = 'AL2',
    AL2023 = 'AL2023',
}

export interface RolloutConfig {
    readonly stateTableName: string;
    readonly amiParameterName: string;
    readonly clusterTags: ClusterTagFilter;
    readonly concurrencyLimit: number;
    readonly rolloutTimeoutSeconds: number;
    readonly staleInProgressSeconds: number;
    readonly pollMinDelaySeconds: number;
    readonly pollMaxDelaySeconds: number;
    readonly nodeOsFamily: NodeOsFamily;
    readonly alertTopicArn?: string;
}

export const ROLLOUT_DEFAULTS = {
    concurrencyLimit: 4,
    rolloutTimeoutSeconds: 3600,
    staleInProgressSeconds: 7200,
    pollMinDelaySeconds: 30,
    pollMaxDelaySeconds: 120,
    nodeOsFamily: NodeOsFamily.AL2023,
} as const;

type Env = Record<string, string | undefined>;

function fromEnv(env: Env, key: string): string | undefined {
    return env[key] || undefined;
}

function required(env: Env, key: string): string {
    const value = fromEnv(env, key);
    if (!value) {
        throw new Error(`Missing required environment variable ${key}`);
    }
    return value;
}

function positiveInteger(env: Env, key: string, fallback: number): number {
    const raw = fromEnv(env, key);
    if (raw === undefined) return fallback;

    const value = Number(raw);
    if (!Number.isInteger(value) || value < 1) {
        throw new Error(`${key} must be a positive integer, got '${raw}'`);
    }
    return value;
}

function isRecord(value: unknown): value is Record<string, unknown> {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Parse the cluster tag filter.
 *
 * Accepts the CloudFormation tag list shape (`[{ "Key": "Team", "Value": "Dev" }]`)
 * or a flat object (`{ "Team": "Dev" }`). Order is preserved.
 */
export function parseClusterTags(raw: string | undefined): ClusterTagFilter {
    if (!raw || raw.trim() === '') return [];

    let parsed: unknown;
    try {
        parsed = JSON.parse(raw);
    } catch (error) {
        throw new Error(`CLUSTER_TAGS is not valid JSON: ${raw}`, { cause: error });
    }

    if (Array.isArray(parsed)) {
        return parsed.map((entry: unknown, index): ClusterTag => {
            if (!isRecord(entry) || typeof entry.Key !== 'string' || typeof entry.Value !== 'string') {
                throw new Error(`CLUSTER_TAGS[${index}] must be { "Key": string, "Value": string }`);
            }
            return { key: entry.Key, value: entry.Value };
        });
    }

    if (isRecord(parsed)) {
        return Object.entries(parsed).map(([key, value]): ClusterTag => {
            if (typeof value !== 'string') {
                throw new Error(`CLUSTER_TAGS.${key} must be a string`);
            }
            return { key, value };
        });
    }

    throw new Error('CLUSTER_TAGS must be a JSON array or object');
}

function parseOsFamily(raw: string | undefined): NodeOsFamily {
    if (raw === undefined) return ROLLOUT_DEFAULTS.nodeOsFamily;
    const match = Object.values(NodeOsFamily).find((family) => family === raw.toUpperCase());
    if (!match) {
        throw new Error(`NODE_OS_FAMILY must be one of ${Object.values(NodeOsFamily).join(', ')}, got '${raw}'`);
    }
    return match;
}

/**
 * Build a validated config from the Lambda environment.
 */
export function loadRolloutConfig(env: Env = process.env): RolloutConfig {
    const pollMinDelaySeconds = positiveInteger(env, 'POLL_MIN_DELAY_SECONDS', ROLLOUT_DEFAULTS.pollMinDelaySeconds);
    const pollMaxDelaySeconds = positiveInteger(env, 'POLL_MAX_DELAY_SECONDS', ROLLOUT_DEFAULTS.pollMaxDelaySeconds);
    const rolloutTimeoutSeconds = positiveInteger(env, 'ROLLOUT_TIMEOUT_SECONDS', ROLLOUT_DEFAULTS.rolloutTimeoutSeconds);

    if (pollMaxDelaySeconds < pollMinDelaySeconds) {
        throw new Error('POLL_MAX_DELAY_SECONDS must not be lower than POLL_MIN_DELAY_SECONDS');
    }
    if (rolloutTimeoutSeconds <= pollMinDelaySeconds) {
        throw new Error('ROLLOUT_TIMEOUT_SECONDS must be greater than POLL_MIN_DELAY_SECONDS');
    }

    return {
        stateTableName: required(env, 'STATE_TABLE_NAME'),
        amiParameterName: required(env, 'AMI_PARAMETER_NAME'),
        clusterTags: parseClusterTags(fromEnv(env, 'CLUSTER_TAGS')),
        concurrencyLimit: positiveInteger(env, 'CONCURRENCY_LIMIT', ROLLOUT_DEFAULTS.concurrencyLimit),
        rolloutTimeoutSeconds,
        staleInProgressSeconds: positiveInteger(env, 'STALE_IN_PROGRESS_SECONDS', ROLLOUT_DEFAULTS.staleInProgressSeconds),
        pollMinDelaySeconds,
        pollMaxDelaySeconds,
        nodeOsFamily: parseOsFamily(fromEnv(env, 'NODE_OS_FAMILY')),
        alertTopicArn: fromEnv(env, 'ALERT_TOPIC_ARN'),
    };
}
