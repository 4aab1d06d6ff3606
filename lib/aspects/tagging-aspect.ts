/** @format */

import * as cdk from 'aws-cdk-lib/core';

import { IConstruct } from 'constructs';

import { Environment } from '../config/environments';

export interface TagConfig {
    readonly environment: Environment;
    readonly project: string;
    readonly owner: string;
    readonly costCenter?: string;
    /**
     * Extra organisation tags, e.g. from `EXTRA_TAGS='{"DataClass":"internal"}'`.
     * Cannot replace the standard tags.
     */
    readonly additionalTags?: Record<string, string>;
}

const STANDARD_TAG_KEYS = ['Environment', 'Project', 'Owner', 'ManagedBy', 'CostCenter'];

/**
 * Resolve the full tag set for a deployment.
 */
export function buildTags(config: TagConfig): Record<string, string> {
    const additional = config.additionalTags ?? {};
    const clashes = Object.keys(additional).filter((key) => STANDARD_TAG_KEYS.includes(key));
    if (clashes.length > 0) {
        throw new Error(`Additional tags cannot override standard tags: ${clashes.join(', ')}`);
    }

    return {
        Environment: config.environment,
        Project: config.project,
        Owner: config.owner,
        ManagedBy: 'CDK',
        ...(config.costCenter && { CostCenter: config.costCenter }),
        ...additional,
    };
}

/**
 * Aspect that applies consistent tags to all taggable resources.
 * Writes through the tag manager so construct-level `Component` tags are kept.
 */
export class TaggingAspect implements cdk.IAspect {
    private readonly tags: Record<string, string>;

    constructor(config: TagConfig) {
        this.tags = buildTags(config);
    }

    public visit(node: IConstruct): void {
        if (!cdk.TagManager.isTaggable(node)) return;
        for (const [key, value] of Object.entries(this.tags)) {
            node.tags.setTag(key, value);
        }
    }
}
