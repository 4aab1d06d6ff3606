/**
 * @format
 * Rollout State Store
 *
 * Persists one RolloutRecord per node group and one SourceRecord per
 * watched SSM parameter. Writes that claim or advance a record are
 * conditional on the record's `revision`, so two runs racing on the same
 * node group cannot both move it to InProgress.
 *
 * Single-table layout:
 *   pk = NODEGROUP#{cluster}#{nodegroup}  sk = ROLLOUT
 *   pk = SOURCE#{parameterName}           sk = AMI
 */

import { DynamoDBClient } from '@aws-sdk/client-dynamodb';
import {
    DynamoDBDocumentClient,
    GetCommand,
    PutCommand,
    PutCommandInput,
} from '@aws-sdk/lib-dynamodb';

import {
    AmiReference,
    NodeGroupKey,
    RecordedError,
    RolloutErrorKind,
    RolloutRecord,
    RolloutStatus,
    SourceRecord,
} from './types';

export interface RolloutStateStore {
    get(target: NodeGroupKey): Promise<RolloutRecord | undefined>;
    put(target: NodeGroupKey, record: RolloutRecord): Promise<void>;
    /**
     * Write `record` only if the stored revision equals `expectedRevision`
     * (or no record exists when `expectedRevision` is undefined).
     * Resolves false when another writer got there first.
     */
    compareAndSet(
        target: NodeGroupKey,
        expectedRevision: number | undefined,
        record: RolloutRecord,
    ): Promise<boolean>;
    getSource(parameterName: string): Promise<SourceRecord | undefined>;
    compareAndSetSource(expectedRevision: number | undefined, record: SourceRecord): Promise<boolean>;
}

// =============================================================================
// KEYS
// =============================================================================

const ROLLOUT_SK = 'ROLLOUT';
const SOURCE_SK = 'AMI';

export function rolloutKey(target: NodeGroupKey): { pk: string; sk: string } {
    return { pk: `NODEGROUP#${target.clusterName}#${target.nodegroupName}`, sk: ROLLOUT_SK };
}

export function sourceKey(parameterName: string): { pk: string; sk: string } {
    return { pk: `SOURCE#${parameterName}`, sk: SOURCE_SK };
}

// =============================================================================
// DYNAMODB IMPLEMENTATION
// =============================================================================

function isConditionalCheckFailure(error: unknown): boolean {
    return error instanceof Error && error.name === 'ConditionalCheckFailedException';
}

function isRecordShape(item: Record<string, unknown> | undefined): item is Record<string, unknown> {
    return item !== undefined && typeof item.revision === 'number';
}

export class DynamoDbStateStore implements RolloutStateStore {
    private readonly docClient: DynamoDBDocumentClient;

    constructor(
        private readonly tableName: string,
        client: DynamoDBClient = new DynamoDBClient({}),
    ) {
        this.docClient = DynamoDBDocumentClient.from(client, {
            marshallOptions: { removeUndefinedValues: true },
        });
    }

    async get(target: NodeGroupKey): Promise<RolloutRecord | undefined> {
        const result = await this.docClient.send(
            new GetCommand({
                TableName: this.tableName,
                Key: rolloutKey(target),
                ConsistentRead: true,
            }),
        );
        return isRecordShape(result.Item) ? toRolloutRecord(result.Item) : undefined;
    }

    async put(target: NodeGroupKey, record: RolloutRecord): Promise<void> {
        await this.docClient.send(
            new PutCommand({
                TableName: this.tableName,
                Item: { ...rolloutKey(target), ...record },
            }),
        );
    }

    async compareAndSet(
        target: NodeGroupKey,
        expectedRevision: number | undefined,
        record: RolloutRecord,
    ): Promise<boolean> {
        return this.conditionalPut({ ...rolloutKey(target), ...record }, expectedRevision);
    }

    async getSource(parameterName: string): Promise<SourceRecord | undefined> {
        const result = await this.docClient.send(
            new GetCommand({
                TableName: this.tableName,
                Key: sourceKey(parameterName),
                ConsistentRead: true,
            }),
        );
        return isRecordShape(result.Item) ? toSourceRecord(result.Item) : undefined;
    }

    async compareAndSetSource(expectedRevision: number | undefined, record: SourceRecord): Promise<boolean> {
        return this.conditionalPut({ ...sourceKey(record.parameterName), ...record }, expectedRevision);
    }

    private async conditionalPut(
        item: Record<string, unknown>,
        expectedRevision: number | undefined,
    ): Promise<boolean> {
        const condition: Pick<PutCommandInput, 'ConditionExpression' | 'ExpressionAttributeValues'> =
            expectedRevision === undefined
                ? { ConditionExpression: 'attribute_not_exists(pk)' }
                : {
                      ConditionExpression: 'revision = :expected',
                      ExpressionAttributeValues: { ':expected': expectedRevision },
                  };

        try {
            await this.docClient.send(
                new PutCommand({
                    TableName: this.tableName,
                    Item: item,
                    ...condition,
                }),
            );
            return true;
        } catch (error) {
            if (isConditionalCheckFailure(error)) {
                return false;
            }
            throw error;
        }
    }
}

// =============================================================================
// ITEM MAPPING
// =============================================================================

function asString(value: unknown): string | undefined {
    return typeof value === 'string' ? value : undefined;
}

function asAmi(value: unknown): AmiReference | undefined {
    if (typeof value !== 'object' || value === null) return undefined;
    const imageId = 'imageId' in value ? asString(value.imageId) : undefined;
    const discoveredAt = 'discoveredAt' in value ? asString(value.discoveredAt) : undefined;
    return imageId && discoveredAt ? { imageId, discoveredAt } : undefined;
}

function asStatus(value: unknown): RolloutStatus {
    return Object.values(RolloutStatus).find((status) => status === value) ?? RolloutStatus.PENDING;
}

function asRecordedError(value: unknown): RecordedError | undefined {
    if (typeof value !== 'object' || value === null) return undefined;
    const rawKind = 'kind' in value ? value.kind : undefined;
    const kind = Object.values(RolloutErrorKind).find((k) => k === rawKind);
    const message = 'message' in value ? asString(value.message) : undefined;
    return kind && message !== undefined ? { kind, message } : undefined;
}

function toRolloutRecord(item: Record<string, unknown>): RolloutRecord {
    return {
        clusterName: asString(item.clusterName) ?? '',
        nodegroupName: asString(item.nodegroupName) ?? '',
        status: asStatus(item.status),
        lastAppliedAmi: asAmi(item.lastAppliedAmi),
        targetAmi: asAmi(item.targetAmi),
        lastAttemptAt: asString(item.lastAttemptAt) ?? new Date(0).toISOString(),
        error: asRecordedError(item.error),
        launchTemplateVersion: asString(item.launchTemplateVersion),
        updateId: asString(item.updateId),
        revision: Number(item.revision),
    };
}

function toSourceRecord(item: Record<string, unknown>): SourceRecord | undefined {
    const current = asAmi(item.current);
    const parameterName = asString(item.parameterName);
    if (!current || !parameterName) return undefined;
    return { parameterName, current, revision: Number(item.revision) };
}
