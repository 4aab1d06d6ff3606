/**
 * @format
 * SNS alert publisher
 *
 * Thin wrapper so handlers can publish JSON payloads to the alert topic
 * without repeating client setup. SNS subjects are capped at 100 characters.
 */

import { PublishCommand, SNSClient } from '@aws-sdk/client-sns';

const MAX_SUBJECT_LENGTH = 100;

export class AlertPublisher {
    private readonly snsClient: SNSClient;

    constructor(
        private readonly topicArn: string,
        snsClient?: SNSClient,
    ) {
        this.snsClient = snsClient ?? new SNSClient({});
    }

    async publish(subject: string, payload: unknown): Promise<string | undefined> {
        const response = await this.snsClient.send(
            new PublishCommand({
                TopicArn: this.topicArn,
                Subject: subject.slice(0, MAX_SUBJECT_LENGTH),
                Message: JSON.stringify(payload, null, 2),
            }),
        );
        return response.MessageId;
    }
}
