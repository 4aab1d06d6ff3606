/**
 * @format
 * Parent Image Reminder Lambda Handler
 *
 * Triggered weekly by EventBridge. Compares the date of the last AVAILABLE
 * hardened image build with the last-modified date of the SSM parameter
 * publishing the parent EKS-optimized AMI, and tells the alert topic
 * whether the pipeline should be re-run.
 *
 * Environment Variables:
 * - IMAGE_PIPELINE_ARN: Image Builder pipeline producing hardened AMIs
 * - PARENT_IMAGE_PARAMETER: SSM parameter with the parent AMI id
 * - ALERT_TOPIC_ARN: SNS topic receiving the reminder
 */

import {
    GetImagePipelineCommand,
    GetImageRecipeCommand,
    ImagebuilderClient,
    ImageSummary,
    ListImagePipelineImagesCommand,
} from '@aws-sdk/client-imagebuilder';
import { GetParameterCommand, SSMClient } from '@aws-sdk/client-ssm';
import { Context, ScheduledEvent } from 'aws-lambda';

import { AlertPublisher } from '../shared/alerts';
import { createLogger } from '../shared/logger';

const imageBuilderClient = new ImagebuilderClient({});
const ssmClient = new SSMClient({});

const logger = createLogger('parent-image-reminder');

const MAX_PIPELINE_IMAGES = 15;

export interface ReminderConfig {
    readonly imagePipelineArn: string;
    readonly parentImageParameter: string;
    readonly alertTopicArn: string;
}

export interface ReminderResult {
    readonly status: 'NewParentImageAvailable' | 'UpToDate' | 'NoImages';
    readonly messageId?: string;
}

function requireEnv(env: NodeJS.ProcessEnv, key: string): string {
    const value = env[key];
    if (!value) {
        throw new Error(`Missing required environment variable ${key}`);
    }
    return value;
}

export function loadReminderConfig(env: NodeJS.ProcessEnv = process.env): ReminderConfig {
    return {
        imagePipelineArn: requireEnv(env, 'IMAGE_PIPELINE_ARN'),
        parentImageParameter: requireEnv(env, 'PARENT_IMAGE_PARAMETER'),
        alertTopicArn: requireEnv(env, 'ALERT_TOPIC_ARN'),
    };
}

/**
 * Order Image Builder versions such as `1.0.2/10` numerically, segment by segment.
 */
export function compareImageVersions(a: string, b: string): number {
    const left = a.split(/[./]/).map(Number);
    const right = b.split(/[./]/).map(Number);
    const length = Math.max(left.length, right.length);

    for (let i = 0; i < length; i++) {
        const diff = (left[i] ?? 0) - (right[i] ?? 0);
        if (diff !== 0) return diff;
    }
    return 0;
}

/** Newest AVAILABLE image by version, if any */
export function latestAvailableImage(images: readonly ImageSummary[]): ImageSummary | undefined {
    return images
        .filter((image) => image.state?.status === 'AVAILABLE' && image.version)
        .reduce<ImageSummary | undefined>(
            (latest, image) =>
                !latest || compareImageVersions(image.version ?? '', latest.version ?? '') > 0 ? image : latest,
            undefined,
        );
}

async function currentParentImage(imagePipelineArn: string): Promise<string | undefined> {
    const pipeline = await imageBuilderClient.send(new GetImagePipelineCommand({ imagePipelineArn }));
    const imageRecipeArn = pipeline.imagePipeline?.imageRecipeArn;
    if (!imageRecipeArn) return undefined;

    const recipe = await imageBuilderClient.send(new GetImageRecipeCommand({ imageRecipeArn }));
    return recipe.imageRecipe?.parentImage;
}

export async function checkParentImage(config: ReminderConfig, alerts: AlertPublisher): Promise<ReminderResult> {
    const listed = await imageBuilderClient.send(
        new ListImagePipelineImagesCommand({
            imagePipelineArn: config.imagePipelineArn,
            maxResults: MAX_PIPELINE_IMAGES,
        }),
    );

    const latest = latestAvailableImage(listed.imageSummaryList ?? []);
    if (!latest?.dateCreated) {
        logger.info('No available images built by the pipeline yet', {
            imagePipelineArn: config.imagePipelineArn,
        });
        return { status: 'NoImages' };
    }

    const parentImageId = await currentParentImage(config.imagePipelineArn);

    const { Parameter: parameter } = await ssmClient.send(
        new GetParameterCommand({ Name: config.parentImageParameter }),
    );
    if (!parameter?.LastModifiedDate) {
        throw new Error(`SSM parameter ${config.parentImageParameter} not found`);
    }

    const imageCreated = new Date(latest.dateCreated);
    const parameterModified = parameter.LastModifiedDate;
    const newParentAvailable = parameterModified.getTime() > imageCreated.getTime();

    const message = newParentAvailable
        ? 'A new version of the parent image for your pipeline is available'
        : 'Parent image is up to date';

    const messageId = await alerts.publish(message, {
        Message: message,
        'Parent image SSM Parameter path': parameter.Name,
        'New parent image AMI ID': parameter.Value,
        'Parent image last modified date': parameterModified.toISOString(),
        'Current parent image AMI ID': parentImageId,
        'Image Pipeline last image build date': imageCreated.toISOString(),
        'Image Pipeline ARN': config.imagePipelineArn,
    });

    logger.info(message, { latestVersion: latest.version, messageId });

    return {
        status: newParentAvailable ? 'NewParentImageAvailable' : 'UpToDate',
        messageId,
    };
}

export const handler = async (event: ScheduledEvent, context: Context): Promise<ReminderResult> => {
    logger.info('Parent image check started', { eventId: event.id, requestId: context.awsRequestId });

    try {
        const config = loadReminderConfig();
        return await checkParentImage(config, new AlertPublisher(config.alertTopicArn));
    } catch (error) {
        logger.error('Parent image check failed', { error });
        throw error;
    }
};
