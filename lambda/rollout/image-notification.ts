/**
 * @format
 * Image Builder Notification Lambda Handler
 *
 * Subscribed to the Image Builder pipeline's SNS topic. When a build
 * finishes AVAILABLE, the announced AMI is rolled out straight away
 * instead of waiting for the weekly check. Any other state is logged and
 * its reason returned.
 *
 * SNS message shape (Image Builder image notification):
 * { "state": { "status": "AVAILABLE", "reason"?: string },
 *   "outputResources": { "amis": [{ "image": "ami-…", "region": "…" }] } }
 */

import { Context, SNSEvent } from 'aws-lambda';

import { createLogger } from '../shared/logger';
import { runWithDeadline } from './index';
import { RunSummary } from './types';

const logger = createLogger('image-notification');

export interface ImageBuildNotification {
    readonly status: string;
    readonly reason?: string;
    readonly imageId?: string;
}

export interface SkippedNotification {
    readonly status: string;
    readonly reason: string;
}

function field(value: unknown, key: string): unknown {
    if (typeof value !== 'object' || value === null || !(key in value)) return undefined;
    return Object.entries(value).find(([k]) => k === key)?.[1];
}

function asString(value: unknown): string | undefined {
    return typeof value === 'string' ? value : undefined;
}

/**
 * Pull the build state and first output AMI out of an Image Builder SNS message.
 */
export function parseImageNotification(message: string): ImageBuildNotification {
    let parsed: unknown;
    try {
        parsed = JSON.parse(message);
    } catch (error) {
        throw new Error('Image Builder notification is not valid JSON', { cause: error });
    }

    const state = field(parsed, 'state');
    const status = asString(field(state, 'status'));
    if (!status) {
        throw new Error('Image Builder notification has no state.status');
    }

    const amis = field(field(parsed, 'outputResources'), 'amis');
    const firstAmi = Array.isArray(amis) ? amis[0] : undefined;

    return {
        status,
        reason: asString(field(state, 'reason')),
        imageId: asString(field(firstAmi, 'image')),
    };
}

export const handler = async (
    event: SNSEvent,
    context: Context,
): Promise<RunSummary | SkippedNotification> => {
    const record = event.Records[0];
    if (!record) {
        throw new Error('SNS event contains no records');
    }

    const notification = parseImageNotification(record.Sns.Message);
    logger.info('Image Builder notification received', {
        status: notification.status,
        imageId: notification.imageId,
    });

    if (notification.status !== 'AVAILABLE' || !notification.imageId) {
        return {
            status: notification.status,
            reason: notification.reason ?? `Image state is ${notification.status}, nothing to roll out`,
        };
    }

    return runWithDeadline(context, {
        imageId: notification.imageId,
        discoveredAt: record.Sns.Timestamp || new Date().toISOString(),
    });
};
