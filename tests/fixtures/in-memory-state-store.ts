/**
 * @format
 * In-process RolloutStateStore with the same conditional-write semantics
 * as the DynamoDB store.
 */

import { RolloutStateStore, rolloutKey, sourceKey } from '../../lambda/rollout/state-store';
import { NodeGroupKey, RolloutRecord, SourceRecord } from '../../lambda/rollout/types';

export class InMemoryStateStore implements RolloutStateStore {
    readonly records = new Map<string, RolloutRecord>();
    readonly sources = new Map<string, SourceRecord>();

    /** Runs before each compareAndSet; lets a test interleave a competing writer */
    beforeCompareAndSet?: (target: NodeGroupKey, record: RolloutRecord) => void;

    private static key(target: NodeGroupKey): string {
        return rolloutKey(target).pk;
    }

    seed(record: RolloutRecord): void {
        this.records.set(InMemoryStateStore.key(record), { ...record });
    }

    recordFor(clusterName: string, nodegroupName: string): RolloutRecord | undefined {
        return this.records.get(InMemoryStateStore.key({ clusterName, nodegroupName }));
    }

    async get(target: NodeGroupKey): Promise<RolloutRecord | undefined> {
        const record = this.records.get(InMemoryStateStore.key(target));
        return record && { ...record };
    }

    async put(target: NodeGroupKey, record: RolloutRecord): Promise<void> {
        this.records.set(InMemoryStateStore.key(target), { ...record });
    }

    async compareAndSet(
        target: NodeGroupKey,
        expectedRevision: number | undefined,
        record: RolloutRecord,
    ): Promise<boolean> {
        this.beforeCompareAndSet?.(target, record);
        const current = this.records.get(InMemoryStateStore.key(target));
        if (current?.revision !== expectedRevision) {
            return false;
        }
        this.records.set(InMemoryStateStore.key(target), { ...record });
        return true;
    }

    async getSource(parameterName: string): Promise<SourceRecord | undefined> {
        const record = this.sources.get(sourceKey(parameterName).pk);
        return record && { ...record };
    }

    async compareAndSetSource(expectedRevision: number | undefined, record: SourceRecord): Promise<boolean> {
        const key = sourceKey(record.parameterName).pk;
        if (this.sources.get(key)?.revision !== expectedRevision) {
            return false;
        }
        this.sources.set(key, { ...record });
        return true;
    }
}
