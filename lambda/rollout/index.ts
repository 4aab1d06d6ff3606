/**
 * @format
 * Scheduled AMI Rollout Lambda Handler
 *
 * Triggered weekly by EventBridge. Checks the hardened AMI parameter and
 * rolls any new AMI out to the launch templates of matching EKS managed
 * node groups.
 *
 * Environment Variables: see ./config.ts
 *
 * Event Flow:
 * 1. EventBridge schedule fires (rule is disabled when scheduled checks are off)
 * 2. This Lambda: watch → select → apply, with per-node-group isolation
 * 3. Summary logged; SNS alert published when any node group failed
 *
 * The run stops starting new node groups shortly before the Lambda deadline.
 * Node groups already updating keep their InProgress record and update id;
 * the next run reads the update's outcome before deciding anything else.
 */

import { DynamoDBClient } from '@aws-sdk/client-dynamodb';
import { EC2Client } from '@aws-sdk/client-ec2';
import { EKSClient } from '@aws-sdk/client-eks';
import { SNSClient } from '@aws-sdk/client-sns';
import { SSMClient } from '@aws-sdk/client-ssm';
import { Context, ScheduledEvent } from 'aws-lambda';

import { AlertPublisher } from '../shared/alerts';
import { createLogger } from '../shared/logger';
import { AmiWatcher } from './ami-watcher';
import { ClusterSelector } from './cluster-selector';
import { RolloutConfig, loadRolloutConfig } from './config';
import { RolloutController } from './rollout-controller';
import { RolloutRunDeps, executeRolloutRun } from './rollout-run';
import { DynamoDbStateStore } from './state-store';
import { AmiReference, RunSummary } from './types';

const dynamoClient = new DynamoDBClient({});
const ec2Client = new EC2Client({});
const eksClient = new EKSClient({});
const snsClient = new SNSClient({});
const ssmClient = new SSMClient({});

/** Time kept back from the Lambda deadline to finish logging and alerting */
const DEADLINE_MARGIN_MS = 60_000;

/**
 * Wire the rollout components for one invocation.
 */
export function createRolloutDeps(config: RolloutConfig, requestId: string): RolloutRunDeps {
    const logger = createLogger('ami-rollout', { requestId });
    const store = new DynamoDbStateStore(config.stateTableName, dynamoClient);

    return {
        logger,
        watcher: new AmiWatcher({
            parameterName: config.amiParameterName,
            store,
            ssmClient,
            logger: logger.child({ component: 'ami-watcher' }),
        }),
        selector: new ClusterSelector(eksClient, logger.child({ component: 'cluster-selector' })),
        controller: new RolloutController({
            store,
            nodeOsFamily: config.nodeOsFamily,
            concurrencyLimit: config.concurrencyLimit,
            rolloutTimeoutSeconds: config.rolloutTimeoutSeconds,
            staleInProgressSeconds: config.staleInProgressSeconds,
            pollMinDelaySeconds: config.pollMinDelaySeconds,
            pollMaxDelaySeconds: config.pollMaxDelaySeconds,
            eksClient,
            ec2Client,
            logger: logger.child({ component: 'rollout-controller' }),
        }),
        alerts: config.alertTopicArn ? new AlertPublisher(config.alertTopicArn, snsClient) : undefined,
    };
}

/**
 * Run a rollout with an abort signal that fires before the Lambda deadline.
 */
export async function runWithDeadline(
    context: Context,
    explicitAmi?: AmiReference,
): Promise<RunSummary> {
    const config = loadRolloutConfig();
    const deps = createRolloutDeps(config, context.awsRequestId);

    const controller = new AbortController();
    const budget = Math.max(context.getRemainingTimeInMillis() - DEADLINE_MARGIN_MS, 0);
    const timer = setTimeout(() => controller.abort(), budget);

    try {
        return await executeRolloutRun(deps, {
            clusterTags: config.clusterTags,
            explicitAmi,
            signal: controller.signal,
        });
    } catch (error) {
        deps.logger?.error('Rollout run failed', { error });
        throw error;
    } finally {
        clearTimeout(timer);
    }
}

export const handler = async (event: ScheduledEvent, context: Context): Promise<RunSummary> => {
    console.log(`Scheduled rollout check ${event.id} at ${event.time}`);
    return runWithDeadline(context);
};
