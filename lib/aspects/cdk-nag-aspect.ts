/**
 * @format
 * CDK-Nag Compliance Aspect
 *
 * Runs the cdk-nag rule packs chosen with the `nagPacks` context value.
 * AwsSolutions is the default; NIST 800-53 Rev 5 is the second pack the
 * hardened node image is audited against.
 */

import { AwsSolutionsChecks, NIST80053R5Checks, NagPackProps, NagPackSuppression, NagSuppressions } from 'cdk-nag';

import { Aspects, IAspect, Stack } from 'aws-cdk-lib/core';

import { IConstruct } from 'constructs';

export enum CompliancePack {
    AWS_SOLUTIONS = 'AwsSolutions',
    NIST_800_53 = 'NIST800-53',
}

const PACK_FACTORIES: Record<CompliancePack, (props: NagPackProps) => IAspect> = {
    [CompliancePack.AWS_SOLUTIONS]: (props) => new AwsSolutionsChecks(props),
    [CompliancePack.NIST_800_53]: (props) => new NIST80053R5Checks(props),
};

const DEFAULT_PACKS: readonly CompliancePack[] = [CompliancePack.AWS_SOLUTIONS];

/**
 * Add one cdk-nag aspect per pack to `scope`. Findings are written as
 * CSV reports next to the synthesized templates.
 *
 * @example
 * applyCdkNag(app, parseCompliancePacks(app.node.tryGetContext('nagPacks')));
 */
export function applyCdkNag(scope: IConstruct, packs: readonly CompliancePack[] = DEFAULT_PACKS): void {
    for (const pack of new Set(packs)) {
        Aspects.of(scope).add(PACK_FACTORIES[pack]({ verbose: false, reports: true }));
    }
}

/**
 * Parse a comma-separated pack list such as `AwsSolutions,NIST800-53`.
 */
export function parseCompliancePacks(value: unknown): CompliancePack[] {
    if (typeof value !== 'string' || value.trim() === '') {
        return [...DEFAULT_PACKS];
    }

    return value.split(',').map((raw) => {
        const name = raw.trim();
        const pack = Object.values(CompliancePack).find((candidate) => candidate === name);
        if (!pack) {
            throw new Error(
                `Unknown compliance pack '${name}'. Use one of: ${Object.values(CompliancePack).join(', ')}`,
            );
        }
        return pack;
    });
}

/**
 * Suppressions shared by every stack in this app.
 */
export const COMMON_SUPPRESSIONS: NagPackSuppression[] = [
    {
        id: 'AwsSolutions-IAM4',
        reason: 'AWS managed policies used for Lambda logging and Image Builder build instances',
    },
    {
        id: 'AwsSolutions-L1',
        reason: 'Functions pin NODEJS_20_X to match the project toolchain',
    },
];

/**
 * Apply common suppressions to a stack.
 *
 * @example
 * ```typescript
 * applyCommonSuppressions(rolloutStack);
 * ```
 */
export function applyCommonSuppressions(stack: Stack): void {
    NagSuppressions.addStackSuppressions(stack, COMMON_SUPPRESSIONS);
}
