/**
 * @format
 * EventBridge Rule Construct
 *
 * Scheduled EventBridge rule with Lambda targets.
 */

import * as events from 'aws-cdk-lib/aws-events';
import * as targets from 'aws-cdk-lib/aws-events-targets';
import * as lambda from 'aws-cdk-lib/aws-lambda';
import * as cdk from 'aws-cdk-lib/core';

import { Construct } from 'constructs';

export interface EventBridgeRuleConstructProps {
    /** Rule name @default `${namePrefix}-rule` */
    readonly ruleName?: string;

    readonly description?: string;

    /**
     * @example
     * events.Schedule.cron({ weekDay: 'MON', hour: '4', minute: '0' })
     */
    readonly schedule: events.Schedule;

    /** Invoked with the matched event, retried twice, dropped after 24 hours */
    readonly lambdaTargets?: lambda.IFunction[];

    /** Whether the rule is enabled @default true */
    readonly enabled?: boolean;

    /** Name prefix for resources @default 'eks-hardened-ami' */
    readonly namePrefix?: string;
}

/**
 * @example
 * // Weekly Lambda invocation
 * const rule = new EventBridgeRuleConstruct(this, 'WeeklyRule', {
 *   ruleName: 'weekly-rollout-check',
 *   schedule: events.Schedule.cron({ weekDay: 'MON', hour: '4', minute: '0' }),
 *   enabled: config.enableScheduledChecks,
 *   lambdaTargets: [rolloutLambda.function],
 * });
 */
export class EventBridgeRuleConstruct extends Construct {
    public readonly rule: events.Rule;

    constructor(scope: Construct, id: string, props: EventBridgeRuleConstructProps) {
        super(scope, id);

        const namePrefix = props.namePrefix ?? 'eks-hardened-ami';
        const ruleName = props.ruleName ?? `${namePrefix}-rule`;

        this.rule = new events.Rule(this, 'Rule', {
            ruleName,
            description: props.description ?? `${namePrefix} EventBridge rule`,
            schedule: props.schedule,
            enabled: props.enabled ?? true,
        });

        for (const fn of props.lambdaTargets ?? []) {
            this.rule.addTarget(
                new targets.LambdaFunction(fn, {
                    maxEventAge: cdk.Duration.hours(24),
                    retryAttempts: 2,
                }),
            );
        }

        cdk.Tags.of(this.rule).add('Component', 'EventBridge');
    }
}
