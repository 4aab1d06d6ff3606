/**
 * @format
 * Hardened AMI Rollout Stack
 *
 * Builds CIS-hardened EKS node AMIs and rolls them out to the launch
 * templates of tagged EKS managed node groups.
 *
 * Resources:
 * - Image Builder pipeline (hardening component, recipe, distribution → SSM)
 * - DynamoDB table with rollout and source records (pk/sk single table)
 * - SNS alert topic (optional email subscription)
 * - Rollout Lambda, weekly EventBridge trigger
 * - Image notification Lambda, subscribed to the pipeline's SNS topic
 * - Parent image reminder Lambda, weekly EventBridge trigger
 *
 * Both weekly rules follow `enableScheduledChecks`.
 */

import * as path from 'path';

import { NagSuppressions } from 'cdk-nag';

import * as dynamodb from 'aws-cdk-lib/aws-dynamodb';
import * as events from 'aws-cdk-lib/aws-events';
import * as iam from 'aws-cdk-lib/aws-iam';
import * as sns from 'aws-cdk-lib/aws-sns';
import * as subscriptions from 'aws-cdk-lib/aws-sns-subscriptions';
import * as cdk from 'aws-cdk-lib/core';

import { Construct } from 'constructs';

import { HardenedAmiPipelineConstruct } from '../common/compute/constructs/hardened-ami-pipeline';
import { LambdaFunctionConstruct } from '../common/compute/constructs/lambda-function';
import { EventBridgeRuleConstruct } from '../common/events/eventbridge-rule';
import { DynamoDbTableConstruct } from '../common/storage/dynamodb-table';
import { Environment } from '../config/environments';
import { HardenedAmiRolloutConfigs } from '../config/rollout/configurations';

const LAMBDA_ROOT = path.join(__dirname, '..', '..', 'lambda');

/** Lambda hard limit; the run aborts itself a minute before */
const ROLLOUT_FUNCTION_TIMEOUT = cdk.Duration.minutes(15);

export interface AmiRolloutStackProps extends cdk.StackProps {
    readonly targetEnvironment: Environment;
    readonly configs: HardenedAmiRolloutConfigs;
}

export class AmiRolloutStack extends cdk.Stack {
    public readonly pipeline: HardenedAmiPipelineConstruct;
    public readonly stateTable: dynamodb.Table;
    public readonly alertTopic: sns.Topic;
    public readonly rolloutFunction: LambdaFunctionConstruct;
    public readonly imageNotificationFunction: LambdaFunctionConstruct;
    public readonly parentImageReminderFunction: LambdaFunctionConstruct;

    constructor(scope: Construct, id: string, props: AmiRolloutStackProps) {
        super(scope, id, props);

        const { targetEnvironment, configs } = props;
        const { namePrefix, pipeline: pipelineConfig, rollout } = configs;

        // =====================================================================
        // IMAGE BUILDER PIPELINE
        // =====================================================================
        this.pipeline = new HardenedAmiPipelineConstruct(this, 'HardenedAmi', {
            namePrefix,
            pipelineConfig,
        });

        // =====================================================================
        // STATE TABLE
        // =====================================================================
        const table = new DynamoDbTableConstruct(this, 'RolloutState', {
            envName: targetEnvironment,
            projectName: 'eks-hardened-ami',
            tableName: 'rollout-state',
            partitionKey: { name: 'pk', type: dynamodb.AttributeType.STRING },
            sortKey: { name: 'sk', type: dynamodb.AttributeType.STRING },
        });
        this.stateTable = table.table;

        // =====================================================================
        // ALERTS
        // =====================================================================
        this.alertTopic = new sns.Topic(this, 'AlertTopic', {
            topicName: `${namePrefix}-alerts`,
            displayName: 'Hardened AMI rollout alerts',
            enforceSSL: true,
        });
        if (rollout.notificationEmail) {
            this.alertTopic.addSubscription(new subscriptions.EmailSubscription(rollout.notificationEmail));
        }

        // =====================================================================
        // ROLLOUT FUNCTIONS
        // =====================================================================
        const rolloutEnvironment: Record<string, string> = {
            STATE_TABLE_NAME: this.stateTable.tableName,
            AMI_PARAMETER_NAME: this.pipeline.amiSsmParameter.parameterName,
            CLUSTER_TAGS: JSON.stringify(rollout.clusterTags.map((tag) => ({ Key: tag.key, Value: tag.value }))),
            CONCURRENCY_LIMIT: String(rollout.concurrencyLimit),
            ROLLOUT_TIMEOUT_SECONDS: String(rollout.rolloutTimeout.toSeconds()),
            STALE_IN_PROGRESS_SECONDS: String(rollout.staleInProgressTimeout.toSeconds()),
            NODE_OS_FAMILY: rollout.nodeOsFamily,
            ALERT_TOPIC_ARN: this.alertTopic.topicArn,
        };
        const rolloutStatements = this.rolloutPolicyStatements();

        this.rolloutFunction = new LambdaFunctionConstruct(this, 'RolloutFunction', {
            functionName: `${namePrefix}-rollout`,
            description: 'Rolls the latest hardened AMI out to tagged EKS node groups',
            entry: path.join(LAMBDA_ROOT, 'rollout', 'index.ts'),
            namePrefix,
            environment: rolloutEnvironment,
            timeout: ROLLOUT_FUNCTION_TIMEOUT,
            reservedConcurrentExecutions: 1,
            additionalPolicyStatements: rolloutStatements,
        });

        this.imageNotificationFunction = new LambdaFunctionConstruct(this, 'ImageNotificationFunction', {
            functionName: `${namePrefix}-image-notification`,
            description: 'Starts a rollout when Image Builder reports a new AVAILABLE image',
            entry: path.join(LAMBDA_ROOT, 'rollout', 'image-notification.ts'),
            namePrefix,
            environment: rolloutEnvironment,
            timeout: ROLLOUT_FUNCTION_TIMEOUT,
            additionalPolicyStatements: rolloutStatements,
        });

        for (const fn of [this.rolloutFunction, this.imageNotificationFunction]) {
            this.stateTable.grantReadWriteData(fn.role);
            this.pipeline.amiSsmParameter.grantRead(fn.role);
            this.alertTopic.grantPublish(fn.role);
        }

        this.pipeline.notificationTopic.addSubscription(
            new subscriptions.LambdaSubscription(this.imageNotificationFunction.function),
        );

        // =====================================================================
        // PARENT IMAGE REMINDER
        // =====================================================================
        this.parentImageReminderFunction = new LambdaFunctionConstruct(this, 'ParentImageReminderFunction', {
            functionName: `${namePrefix}-parent-image-reminder`,
            description: 'Reports whether the parent EKS-optimized AMI changed since the last build',
            entry: path.join(LAMBDA_ROOT, 'parent-image-reminder', 'index.ts'),
            namePrefix,
            environment: {
                IMAGE_PIPELINE_ARN: this.pipeline.pipelineArn,
                PARENT_IMAGE_PARAMETER: pipelineConfig.parentImageSsmPath,
                ALERT_TOPIC_ARN: this.alertTopic.topicArn,
            },
            timeout: cdk.Duration.minutes(1),
            additionalPolicyStatements: [
                new iam.PolicyStatement({
                    sid: 'ReadImagePipeline',
                    actions: [
                        'imagebuilder:ListImagePipelineImages',
                        'imagebuilder:GetImagePipeline',
                        'imagebuilder:GetImageRecipe',
                    ],
                    resources: ['*'],
                }),
                new iam.PolicyStatement({
                    sid: 'ReadParentImageParameter',
                    actions: ['ssm:GetParameter'],
                    resources: [
                        this.formatArn({
                            service: 'ssm',
                            account: '',
                            resource: 'parameter',
                            resourceName: pipelineConfig.parentImageSsmPath.replace(/^\//, ''),
                        }),
                    ],
                }),
            ],
        });
        this.alertTopic.grantPublish(this.parentImageReminderFunction.role);

        // =====================================================================
        // WEEKLY SCHEDULES
        // =====================================================================
        const schedule = events.Schedule.cron(rollout.schedule);

        new EventBridgeRuleConstruct(this, 'WeeklyRolloutRule', {
            ruleName: `${namePrefix}-weekly-rollout`,
            description: 'Weekly hardened AMI rollout check',
            namePrefix,
            schedule,
            enabled: rollout.enableScheduledChecks,
            lambdaTargets: [this.rolloutFunction.function],
        });

        new EventBridgeRuleConstruct(this, 'WeeklyParentImageRule', {
            ruleName: `${namePrefix}-weekly-parent-image`,
            description: 'Weekly parent EKS-optimized AMI check',
            namePrefix,
            schedule,
            enabled: rollout.enableScheduledChecks,
            lambdaTargets: [this.parentImageReminderFunction.function],
        });

        // =====================================================================
        // OUTPUTS
        // =====================================================================
        new cdk.CfnOutput(this, 'ImagePipelineArn', {
            value: this.pipeline.pipelineArn,
            description: 'Hardened AMI Image Builder pipeline',
        });
        new cdk.CfnOutput(this, 'AmiParameterName', {
            value: this.pipeline.amiSsmParameter.parameterName,
            description: 'SSM parameter holding the latest hardened AMI id',
        });
        new cdk.CfnOutput(this, 'StateTableName', {
            value: this.stateTable.tableName,
            description: 'Rollout state table',
        });

        NagSuppressions.addStackSuppressions(this, [
            {
                id: 'AwsSolutions-IAM5',
                reason: 'EKS clusters and node groups are discovered by tag at run time, so their ARNs are not known at synth time',
            },
            {
                id: 'AwsSolutions-SNS2',
                reason: 'Alert messages carry node group names and AMI ids only',
            },
        ]);
    }

    /**
     * EKS discovery and update, launch template versioning, and passing the
     * node role EKS needs when it replaces nodes.
     */
    private rolloutPolicyStatements(): iam.PolicyStatement[] {
        return [
            new iam.PolicyStatement({
                sid: 'DiscoverAndUpdateNodeGroups',
                actions: [
                    'eks:ListClusters',
                    'eks:DescribeCluster',
                    'eks:ListNodegroups',
                    'eks:DescribeNodegroup',
                    'eks:UpdateNodegroupVersion',
                    'eks:DescribeUpdate',
                ],
                resources: ['*'],
            }),
            new iam.PolicyStatement({
                sid: 'VersionLaunchTemplates',
                actions: [
                    'ec2:CreateLaunchTemplateVersion',
                    'ec2:DescribeLaunchTemplates',
                    'ec2:DescribeLaunchTemplateVersions',
                    'ec2:RunInstances',
                    'ec2:CreateTags',
                ],
                resources: ['*'],
            }),
            new iam.PolicyStatement({
                sid: 'PassNodeRole',
                actions: ['iam:PassRole'],
                resources: ['*'],
                conditions: {
                    StringEquals: { 'iam:PassedToService': 'ec2.amazonaws.com' },
                },
            }),
        ];
    }
}
