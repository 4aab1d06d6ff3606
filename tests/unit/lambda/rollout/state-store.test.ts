/**
 * @format
 * DynamoDB State Store - Unit Tests
 */

import { DynamoDBClient } from '@aws-sdk/client-dynamodb';
import { DynamoDBDocumentClient, GetCommand, PutCommand } from '@aws-sdk/lib-dynamodb';
import { mockClient } from 'aws-sdk-client-mock';
import 'aws-sdk-client-mock-jest';

import { DynamoDbStateStore, rolloutKey, sourceKey } from '../../../../lambda/rollout/state-store';
import { RolloutErrorKind, RolloutRecord, RolloutStatus } from '../../../../lambda/rollout/types';
import { AMI_PARAMETER, NEW_AMI, OLD_AMI, TABLE_NAME, serviceError } from '../../../fixtures';

const ddbMock = mockClient(DynamoDBDocumentClient);

const TARGET = { clusterName: 'dev-a', nodegroupName: 'workers' };

const RECORD: RolloutRecord = {
    ...TARGET,
    status: RolloutStatus.SUCCEEDED,
    lastAppliedAmi: OLD_AMI,
    targetAmi: OLD_AMI,
    lastAttemptAt: '2024-05-02T10:00:00.000Z',
    launchTemplateVersion: '4',
    updateId: 'update-1',
    revision: 3,
};

describe('state store keys', () => {
    it('addresses node groups and sources in separate partitions', () => {
        expect(rolloutKey(TARGET)).toEqual({ pk: 'NODEGROUP#dev-a#workers', sk: 'ROLLOUT' });
        expect(sourceKey(AMI_PARAMETER)).toEqual({
            pk: 'SOURCE#/eks-hardened-ami-test/hardened-ami/latest',
            sk: 'AMI',
        });
    });
});

describe('DynamoDbStateStore', () => {
    let store: DynamoDbStateStore;

    beforeEach(() => {
        ddbMock.reset();
        store = new DynamoDbStateStore(TABLE_NAME, new DynamoDBClient({}));
    });

    describe('get', () => {
        it('reads the record with a consistent read', async () => {
            ddbMock.on(GetCommand).resolves({ Item: { ...rolloutKey(TARGET), ...RECORD } });

            await expect(store.get(TARGET)).resolves.toEqual({ ...RECORD, error: undefined });
            expect(ddbMock).toHaveReceivedCommandWith(GetCommand, {
                TableName: TABLE_NAME,
                Key: { pk: 'NODEGROUP#dev-a#workers', sk: 'ROLLOUT' },
                ConsistentRead: true,
            });
        });

        it('returns undefined when no record exists', async () => {
            ddbMock.on(GetCommand).resolves({});

            await expect(store.get(TARGET)).resolves.toBeUndefined();
        });

        it('keeps a recorded error and drops an unknown error kind', async () => {
            ddbMock
                .on(GetCommand)
                .resolvesOnce({
                    Item: {
                        ...RECORD,
                        status: 'Failed',
                        error: { kind: 'RolloutTimeout', message: 'took too long' },
                    },
                })
                .resolvesOnce({
                    Item: { ...RECORD, status: 'Failed', error: { kind: 'Mystery', message: 'x' } },
                });

            const known = await store.get(TARGET);
            const unknown = await store.get(TARGET);

            expect(known?.status).toBe(RolloutStatus.FAILED);
            expect(known?.error).toEqual({ kind: RolloutErrorKind.ROLLOUT_TIMEOUT, message: 'took too long' });
            expect(unknown?.error).toBeUndefined();
        });
    });

    describe('compareAndSet', () => {
        it('requires the record to be absent when no revision is expected', async () => {
            ddbMock.on(PutCommand).resolves({});

            await expect(store.compareAndSet(TARGET, undefined, { ...RECORD, revision: 1 })).resolves.toBe(true);
            expect(ddbMock).toHaveReceivedCommandWith(PutCommand, {
                TableName: TABLE_NAME,
                ConditionExpression: 'attribute_not_exists(pk)',
            });
        });

        it('conditions the write on the expected revision', async () => {
            ddbMock.on(PutCommand).resolves({});
            const next = { ...RECORD, status: RolloutStatus.IN_PROGRESS, targetAmi: NEW_AMI, revision: 4 };

            await expect(store.compareAndSet(TARGET, 3, next)).resolves.toBe(true);

            const input = ddbMock.commandCalls(PutCommand)[0].args[0].input;
            expect(input.ConditionExpression).toBe('revision = :expected');
            expect(input.ExpressionAttributeValues).toEqual({ ':expected': 3 });
            expect(input.Item).toMatchObject({
                pk: 'NODEGROUP#dev-a#workers',
                sk: 'ROLLOUT',
                status: 'InProgress',
                targetAmi: NEW_AMI,
                revision: 4,
            });
        });

        it('resolves false when another writer changed the record', async () => {
            ddbMock.on(PutCommand).rejects(serviceError('ConditionalCheckFailedException', 'client'));

            await expect(store.compareAndSet(TARGET, 3, { ...RECORD, revision: 4 })).resolves.toBe(false);
        });

        it('rethrows any other failure', async () => {
            ddbMock.on(PutCommand).rejects(serviceError('ProvisionedThroughputExceededException', 'client', 'slow down'));

            await expect(store.compareAndSet(TARGET, 3, { ...RECORD, revision: 4 })).rejects.toThrow('slow down');
        });
    });

    describe('sources', () => {
        it('reads and conditionally writes the last known AMI', async () => {
            ddbMock.on(GetCommand).resolves({
                Item: { ...sourceKey(AMI_PARAMETER), parameterName: AMI_PARAMETER, current: OLD_AMI, revision: 2 },
            });
            ddbMock.on(PutCommand).resolves({});

            await expect(store.getSource(AMI_PARAMETER)).resolves.toEqual({
                parameterName: AMI_PARAMETER,
                current: OLD_AMI,
                revision: 2,
            });
            await expect(
                store.compareAndSetSource(2, { parameterName: AMI_PARAMETER, current: NEW_AMI, revision: 3 }),
            ).resolves.toBe(true);
            expect(ddbMock).toHaveReceivedCommandWith(PutCommand, {
                Item: {
                    pk: 'SOURCE#/eks-hardened-ami-test/hardened-ami/latest',
                    sk: 'AMI',
                    parameterName: AMI_PARAMETER,
                    current: NEW_AMI,
                    revision: 3,
                },
                ConditionExpression: 'revision = :expected',
            });
        });

        it('ignores a source item without an AMI', async () => {
            ddbMock.on(GetCommand).resolves({ Item: { parameterName: AMI_PARAMETER, revision: 1 } });

            await expect(store.getSource(AMI_PARAMETER)).resolves.toBeUndefined();
        });
    });
});
