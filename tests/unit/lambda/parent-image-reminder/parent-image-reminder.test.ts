/**
 * @format
 * Parent Image Reminder Lambda - Unit Tests
 */

import {
    GetImagePipelineCommand,
    GetImageRecipeCommand,
    ImagebuilderClient,
    ListImagePipelineImagesCommand,
} from '@aws-sdk/client-imagebuilder';
import { PublishCommand, SNSClient } from '@aws-sdk/client-sns';
import { GetParameterCommand, SSMClient } from '@aws-sdk/client-ssm';
import { mockClient } from 'aws-sdk-client-mock';
import 'aws-sdk-client-mock-jest';

import {
    compareImageVersions,
    handler,
    latestAvailableImage,
    loadReminderConfig,
} from '../../../../lambda/parent-image-reminder/index';
import { ALERT_TOPIC_ARN, createMockContext, createScheduledEvent } from '../../../fixtures';

const imageBuilderMock = mockClient(ImagebuilderClient);
const snsMock = mockClient(SNSClient);
const ssmMock = mockClient(SSMClient);

const PIPELINE_ARN = 'arn:aws:imagebuilder:eu-west-1:123456789012:image-pipeline/eks-hardened-ami-test-pipeline';
const RECIPE_ARN = 'arn:aws:imagebuilder:eu-west-1:123456789012:image-recipe/eks-hardened-ami-test-recipe/1.0.0';
const PARENT_PARAMETER = '/aws/service/eks/optimized-ami/1.31/amazon-linux-2023/x86_64/standard/recommended/image_id';

function givenParentParameterModified(lastModified: string): void {
    ssmMock.on(GetParameterCommand, { Name: PARENT_PARAMETER }).resolves({
        Parameter: { Name: PARENT_PARAMETER, Value: 'ami-0fffffffffffffff6', LastModifiedDate: new Date(lastModified) },
    });
}

function publishedMessage(): { subject: string | undefined; body: unknown } {
    const input = snsMock.commandCalls(PublishCommand)[0].args[0].input;
    return { subject: input.Subject, body: JSON.parse(input.Message ?? '{}') };
}

describe('parent image reminder handler', () => {
    const originalEnv = process.env;

    beforeEach(() => {
        imageBuilderMock.reset();
        snsMock.reset();
        ssmMock.reset();
        process.env = {
            ...originalEnv,
            IMAGE_PIPELINE_ARN: PIPELINE_ARN,
            PARENT_IMAGE_PARAMETER: PARENT_PARAMETER,
            ALERT_TOPIC_ARN,
        };

        imageBuilderMock.on(ListImagePipelineImagesCommand).resolves({
            imageSummaryList: [
                { version: '1.0.0/9', state: { status: 'AVAILABLE' }, dateCreated: '2024-05-01T00:00:00.000Z' },
                { version: '1.0.0/10', state: { status: 'AVAILABLE' }, dateCreated: '2024-05-20T00:00:00.000Z' },
                { version: '1.0.0/11', state: { status: 'FAILED' }, dateCreated: '2024-05-25T00:00:00.000Z' },
            ],
        });
        imageBuilderMock.on(GetImagePipelineCommand).resolves({ imagePipeline: { imageRecipeArn: RECIPE_ARN } });
        imageBuilderMock.on(GetImageRecipeCommand).resolves({ imageRecipe: { parentImage: 'ami-0eeeeeeeeeeeeeee5' } });
        snsMock.on(PublishCommand).resolves({ MessageId: 'msg-1' });
    });

    afterAll(() => {
        process.env = originalEnv;
    });

    it('reports a parent image published after the latest build', async () => {
        givenParentParameterModified('2024-05-28T00:00:00.000Z');

        const result = await handler(createScheduledEvent(), createMockContext());

        expect(result).toEqual({ status: 'NewParentImageAvailable', messageId: 'msg-1' });
        expect(imageBuilderMock).toHaveReceivedCommandWith(ListImagePipelineImagesCommand, {
            imagePipelineArn: PIPELINE_ARN,
            maxResults: 15,
        });
        expect(imageBuilderMock).toHaveReceivedCommandWith(GetImageRecipeCommand, { imageRecipeArn: RECIPE_ARN });

        const published = publishedMessage();
        expect(published.subject).toBe('A new version of the parent image for your pipeline is available');
        expect(published.body).toEqual({
            Message: 'A new version of the parent image for your pipeline is available',
            'Parent image SSM Parameter path': PARENT_PARAMETER,
            'New parent image AMI ID': 'ami-0fffffffffffffff6',
            'Parent image last modified date': '2024-05-28T00:00:00.000Z',
            'Current parent image AMI ID': 'ami-0eeeeeeeeeeeeeee5',
            'Image Pipeline last image build date': '2024-05-20T00:00:00.000Z',
            'Image Pipeline ARN': PIPELINE_ARN,
        });
    });

    it('reports up to date when the parent predates the latest build', async () => {
        givenParentParameterModified('2024-05-10T00:00:00.000Z');

        const result = await handler(createScheduledEvent(), createMockContext());

        expect(result).toEqual({ status: 'UpToDate', messageId: 'msg-1' });
        expect(publishedMessage().subject).toBe('Parent image is up to date');
    });

    it('stays quiet until the pipeline has built an image', async () => {
        imageBuilderMock.on(ListImagePipelineImagesCommand).resolves({ imageSummaryList: [] });

        const result = await handler(createScheduledEvent(), createMockContext());

        expect(result).toEqual({ status: 'NoImages' });
        expect(imageBuilderMock).not.toHaveReceivedCommand(GetImagePipelineCommand);
        expect(snsMock).not.toHaveReceivedCommand(PublishCommand);
    });

    it('fails when the parent image parameter does not exist', async () => {
        ssmMock.on(GetParameterCommand).resolves({});

        await expect(handler(createScheduledEvent(), createMockContext())).rejects.toThrow(
            `SSM parameter ${PARENT_PARAMETER} not found`,
        );
        expect(snsMock).not.toHaveReceivedCommand(PublishCommand);
    });
});

describe('loadReminderConfig', () => {
    it('requires every variable', () => {
        expect(() => loadReminderConfig({ IMAGE_PIPELINE_ARN: PIPELINE_ARN })).toThrow(
            'Missing required environment variable PARENT_IMAGE_PARAMETER',
        );
    });
});

describe('image versions', () => {
    it('compares build numbers numerically', () => {
        expect(compareImageVersions('1.0.0/10', '1.0.0/9')).toBeGreaterThan(0);
        expect(compareImageVersions('1.0.1/1', '1.0.0/20')).toBeGreaterThan(0);
        expect(compareImageVersions('1.0.0/3', '1.0.0/3')).toBe(0);
    });

    it('picks the highest AVAILABLE version', () => {
        const latest = latestAvailableImage([
            { version: '1.0.0/2', state: { status: 'AVAILABLE' } },
            { version: '1.0.0/12', state: { status: 'AVAILABLE' } },
            { version: '1.0.0/13', state: { status: 'BUILDING' } },
        ]);

        expect(latest?.version).toBe('1.0.0/12');
        expect(latestAvailableImage([])).toBeUndefined();
    });
});
