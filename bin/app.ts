#!/usr/bin/env node
/**
 * @format
 * Hardened AMI Rollout CDK Entry Point
 *
 * Resolves the environment, builds the rollout stack from its typed
 * configuration, then applies cross-cutting aspects (tagging, compliance).
 *
 * Usage:
 *   npx cdk synth -c environment=development
 *   CLUSTER_TAGS='{"Team":"Platform"}' npx cdk deploy -c environment=production
 *   npx cdk synth -c environment=staging -c nagPacks=AwsSolutions,NIST800-53
 */

import * as cdk from 'aws-cdk-lib/core';

import { applyCdkNag, applyCommonSuppressions, parseCompliancePacks, TaggingAspect } from '../lib/aspects';
import { cdkEnvironment, isValidEnvironment, resolveEnvironment } from '../lib/config/environments';
import { getRolloutConfigs } from '../lib/config/rollout/configurations';
import { AmiRolloutStack } from '../lib/stacks/ami-rollout-stack';

const app = new cdk.App();

/** `{"Key":"Value"}` JSON from EXTRA_TAGS */
function parseExtraTags(raw: string | undefined): Record<string, string> | undefined {
    if (!raw) return undefined;
    const parsed: unknown = JSON.parse(raw);
    if (typeof parsed !== 'object' || parsed === null || Array.isArray(parsed)) {
        throw new Error('EXTRA_TAGS must be a JSON object of string values');
    }
    const tags: Record<string, string> = {};
    for (const [key, value] of Object.entries(parsed)) {
        if (typeof value !== 'string') {
            throw new Error(`EXTRA_TAGS.${key} must be a string`);
        }
        tags[key] = value;
    }
    return tags;
}

// ============================================================================
// 1. Parse & Validate Environment
// ============================================================================

const environmentContext: unknown = app.node.tryGetContext('environment');

if (typeof environmentContext !== 'string' || !isValidEnvironment(environmentContext)) {
    throw new Error('Environment required. Use: -c environment=development|staging|production');
}

const environment = resolveEnvironment(environmentContext);
const configs = getRolloutConfigs(environment);

console.log(`=== Hardened AMI Rollout | Environment: ${environment} ===`);

// ============================================================================
// 2. Create Stack
//
// Config flows through process.env (CI workflow env or local shell) and is
// resolved by getRolloutConfigs(); context only selects the environment.
// ============================================================================

const stack = new AmiRolloutStack(app, `EksHardenedAmi-${environment}`, {
    env: cdkEnvironment(environment),
    description: `Hardened EKS node AMI pipeline and node group rollout (${environment})`,
    targetEnvironment: environment,
    configs,
});

// ============================================================================
// 3. Cross-Cutting Aspects
// ============================================================================

cdk.Aspects.of(app).add(new TaggingAspect({
    environment,
    project: 'eks-hardened-ami',
    owner: process.env.PROJECT_OWNER ?? 'platform-team',
    costCenter: process.env.COST_CENTER,
    additionalTags: parseExtraTags(process.env.EXTRA_TAGS),
}));

const enableNagChecks = app.node.tryGetContext('nagChecks') !== 'false';
if (enableNagChecks) {
    applyCdkNag(app, parseCompliancePacks(app.node.tryGetContext('nagPacks')));
    applyCommonSuppressions(stack);
}

console.log(`\nStack created: ${stack.stackName}\n`);
