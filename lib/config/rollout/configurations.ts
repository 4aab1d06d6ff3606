/**
 * @format
 * Hardened AMI Rollout Configurations
 *
 * Per-environment settings for the Image Builder pipeline and the rollout
 * Lambdas. Every value can be overridden at synth time through environment
 * variables (see `fromEnv` keys below).
 *
 * | Variable                      | Field                      |
 * |-------------------------------|----------------------------|
 * | ANSIBLE_PLAYBOOK_ARGUMENTS    | ansiblePlaybookArguments   |
 * | HARDENING_PLAYBOOK_REPOSITORY | playbookRepository         |
 * | CLUSTER_TAGS                  | clusterTags (JSON)         |
 * | ENABLE_IMAGE_SCANNING         | enableImageScanning        |
 * | ENABLE_SCHEDULED_CHECKS       | enableScheduledChecks      |
 * | CONCURRENCY_LIMIT             | concurrencyLimit           |
 * | ROLLOUT_TIMEOUT_SECONDS       | rolloutTimeout             |
 * | STALE_IN_PROGRESS_SECONDS     | staleInProgressTimeout     |
 * | PARENT_IMAGE_SSM_PATH         | parentImageSsmPath         |
 * | NOTIFICATION_EMAIL            | notificationEmail          |
 * | NODE_OS_FAMILY                | nodeOsFamily               |
 * | IMAGE_BUILDER_SUBNET_ID       | buildSubnetId              |
 * | IMAGE_BUILDER_SECURITY_GROUPS | buildSecurityGroupIds (,)  |
 */

import * as cdk from 'aws-cdk-lib/core';

import { NodeOsFamily, parseClusterTags } from '../../../lambda/rollout/config';
import { ClusterTagFilter } from '../../../lambda/rollout/types';
import { Environment } from '../environments';
import { fromEnv, fromEnvBoolean, fromEnvNumber } from '../env';

// =============================================================================
// TYPES
// =============================================================================

export interface HardenedAmiPipelineConfig {
    /** Git repository holding the CIS hardening playbook */
    readonly playbookRepository: string;
    /** Playbook file inside the repository */
    readonly playbookFile: string;
    /** Extra arguments appended to ansible-playbook, passed through verbatim */
    readonly ansiblePlaybookArguments: string;
    /** Image Builder ECR/Inspector image scanning */
    readonly enableImageScanning: boolean;
    /** Public SSM parameter publishing the parent EKS-optimized AMI */
    readonly parentImageSsmPath: string;
    /** SSM parameter the pipeline writes the hardened AMI id to */
    readonly amiSsmPath: string;
    /** Build instance types */
    readonly instanceTypes: string[];
    /** Build subnet @default the account's default VPC */
    readonly buildSubnetId?: string;
    /** Required with buildSubnetId */
    readonly buildSecurityGroupIds?: string[];
}

export interface RolloutSettings {
    readonly clusterTags: ClusterTagFilter;
    /** Gates both weekly EventBridge rules */
    readonly enableScheduledChecks: boolean;
    readonly concurrencyLimit: number;
    readonly rolloutTimeout: cdk.Duration;
    readonly staleInProgressTimeout: cdk.Duration;
    readonly nodeOsFamily: NodeOsFamily;
    /** Weekly schedule shared by the rollout and parent image checks */
    readonly schedule: { readonly weekDay: string; readonly hour: string; readonly minute: string };
    readonly notificationEmail?: string;
}

export interface HardenedAmiRolloutConfigs {
    readonly namePrefix: string;
    readonly pipeline: HardenedAmiPipelineConfig;
    readonly rollout: RolloutSettings;
}

// =============================================================================
// DEFAULTS
// =============================================================================

const DEFAULT_PARENT_IMAGE_SSM_PATH =
    '/aws/service/eks/optimized-ami/1.31/amazon-linux-2023/x86_64/standard/recommended/image_id';

function nodeOsFamilyFromEnv(): NodeOsFamily | undefined {
    const raw = fromEnv('NODE_OS_FAMILY')?.toUpperCase();
    if (raw === undefined) return undefined;
    const family = Object.values(NodeOsFamily).find((value) => value === raw);
    if (family) return family;
    throw new Error(`NODE_OS_FAMILY must be AL2 or AL2023, got '${raw}'`);
}

function listFromEnv(key: string): string[] | undefined {
    const items = fromEnv(key)
        ?.split(',')
        .map((item) => item.trim())
        .filter(Boolean);
    return items?.length ? items : undefined;
}

function buildConfigs(env: Environment): HardenedAmiRolloutConfigs {
    const namePrefix = `eks-hardened-ami-${env}`;
    const isProduction = env === Environment.PRODUCTION;

    return {
        namePrefix,
        pipeline: {
            playbookRepository:
                fromEnv('HARDENING_PLAYBOOK_REPOSITORY') ?? 'https://github.com/ansible-lockdown/AMAZON2023-CIS.git',
            playbookFile: fromEnv('HARDENING_PLAYBOOK_FILE') ?? 'site.yml',
            ansiblePlaybookArguments: fromEnv('ANSIBLE_PLAYBOOK_ARGUMENTS') ?? '',
            enableImageScanning: fromEnvBoolean('ENABLE_IMAGE_SCANNING') ?? isProduction,
            parentImageSsmPath: fromEnv('PARENT_IMAGE_SSM_PATH') ?? DEFAULT_PARENT_IMAGE_SSM_PATH,
            amiSsmPath: `/${namePrefix}/hardened-ami/latest`,
            instanceTypes: ['t3.medium'],
            buildSubnetId: fromEnv('IMAGE_BUILDER_SUBNET_ID'),
            buildSecurityGroupIds: listFromEnv('IMAGE_BUILDER_SECURITY_GROUPS'),
        },
        rollout: {
            clusterTags: parseClusterTags(fromEnv('CLUSTER_TAGS')),
            enableScheduledChecks: fromEnvBoolean('ENABLE_SCHEDULED_CHECKS') ?? true,
            concurrencyLimit: fromEnvNumber('CONCURRENCY_LIMIT') ?? 4,
            rolloutTimeout: cdk.Duration.seconds(fromEnvNumber('ROLLOUT_TIMEOUT_SECONDS') ?? 3600),
            staleInProgressTimeout: cdk.Duration.seconds(fromEnvNumber('STALE_IN_PROGRESS_SECONDS') ?? 7200),
            nodeOsFamily: nodeOsFamilyFromEnv() ?? NodeOsFamily.AL2023,
            schedule: { weekDay: 'MON', hour: isProduction ? '6' : '4', minute: '0' },
            notificationEmail: fromEnv('NOTIFICATION_EMAIL'),
        },
    };
}

/**
 * Resolve the rollout configuration for an environment.
 * Read at call time so synth-time environment overrides apply.
 */
export function getRolloutConfigs(env: Environment): HardenedAmiRolloutConfigs {
    return buildConfigs(env);
}
