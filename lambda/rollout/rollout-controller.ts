/**
 * @format
 * Rollout Controller
 *
 * Moves one EKS managed node group onto a new AMI:
 * 1. Claims the node group (conditional write → InProgress)
 * 2. Creates a launch template version with the new ImageId and user data
 * 3. Points the node group at that version (UpdateNodegroupVersion)
 * 4. Polls DescribeUpdate with backoff until a terminal state or the timeout
 * 5. Records Succeeded or Failed
 *
 * State machine per node group: InProgress → { Succeeded, Failed }. A claim
 * writes InProgress directly; Pending is never stored.
 * Failures stay with their node group; one failure never blocks another.
 *
 * Timeout Considerations:
 * - A managed node group rolling update replaces every node, typically
 *   10-30 minutes per node group
 * - Once UpdateNodegroupVersion is accepted it cannot be safely revoked,
 *   so cancellation only stops new node groups from starting
 * - A cancelled run stops waiting on in-flight updates and leaves their
 *   records InProgress with the update id; the next run reads the update's
 *   state and records it before deciding anything else
 * - A recorded update still running after the rollout timeout is recorded
 *   as RolloutTimeout; the node group is retried once EKS reports it done
 * - Only InProgress records without an update id (or whose update EKS no
 *   longer knows) are reset on age alone
 */

import { CreateLaunchTemplateVersionCommand, EC2Client } from '@aws-sdk/client-ec2';
import {
    DescribeUpdateCommand,
    DescribeUpdateCommandInput,
    EKSClient,
    ErrorDetail,
    UpdateNodegroupVersionCommand,
    UpdateStatus,
} from '@aws-sdk/client-eks';
import { WaiterState, createWaiter } from '@smithy/util-waiter';

import {
    RolloutTimeoutError,
    UpdateFailedError,
    classifyMutationError,
    errorMessage,
    isClientRejection,
} from '../shared/errors';
import { Logger, createLogger } from '../shared/logger';
import { NodeOsFamily, ROLLOUT_DEFAULTS } from './config';
import { RolloutStateStore } from './state-store';
import {
    AmiReference,
    NodeGroupKey,
    RolloutErrorKind,
    RecordedError,
    RolloutOutcome,
    RolloutRecord,
    RolloutSkipReason,
    RolloutStatus,
    TargetNodeGroup,
    isOlderAmi,
    nodeGroupId,
} from './types';
import { renderUserData } from './user-data';

export interface RolloutControllerProps {
    readonly store: RolloutStateStore;
    readonly nodeOsFamily: NodeOsFamily;
    /** Node groups updated in parallel @default 4 */
    readonly concurrencyLimit?: number;
    /** Wait for one node group update @default 3600 */
    readonly rolloutTimeoutSeconds?: number;
    /** Age after which an InProgress record is considered abandoned @default 7200 */
    readonly staleInProgressSeconds?: number;
    /** DescribeUpdate backoff bounds @default 30 / 120 */
    readonly pollMinDelaySeconds?: number;
    readonly pollMaxDelaySeconds?: number;
    readonly eksClient?: EKSClient;
    readonly ec2Client?: EC2Client;
    readonly logger?: Logger;
    readonly now?: () => Date;
}

export interface RunRolloutOptions {
    /** When aborted, no further node groups are started */
    readonly signal?: AbortSignal;
}

/** Retried on the next cycle while the AMI is still the latest one */
const RETRYABLE_ERRORS = new Set<RolloutErrorKind>([
    RolloutErrorKind.ROLLOUT_TIMEOUT,
    RolloutErrorKind.UPDATE_FAILED,
    RolloutErrorKind.STALE_IN_PROGRESS,
]);

export function isRetryable(kind: RolloutErrorKind): boolean {
    return RETRYABLE_ERRORS.has(kind);
}

/** DescribeUpdate as seen by the settle step */
type UpdateLookup =
    | { readonly state: 'found'; readonly status?: string; readonly detail: string }
    | { readonly state: 'missing' }
    | { readonly state: 'unreadable' };

/** What an earlier run left behind, once checked against EKS */
type Settlement =
    | { readonly state: 'continue'; readonly record: RolloutRecord }
    | { readonly state: 'busy'; readonly detail: string }
    | { readonly state: 'timedOut'; readonly record: RolloutRecord; readonly error: RecordedError };

function describeFailure(updateId: string, status: string | undefined, errors: readonly ErrorDetail[]): string {
    return [
        `Update ${updateId} ended ${status}`,
        ...errors.map((e) => `${e.errorCode ?? 'Unknown'}: ${e.errorMessage ?? ''}`),
    ].join('; ');
}

function skipped(target: NodeGroupKey, reason: RolloutSkipReason, detail?: string): RolloutOutcome {
    return {
        status: 'skipped',
        target: { clusterName: target.clusterName, nodegroupName: target.nodegroupName },
        reason,
        ...(detail !== undefined && { detail }),
    };
}

export class RolloutController {
    private readonly eksClient: EKSClient;
    private readonly ec2Client: EC2Client;
    private readonly logger: Logger;
    private readonly now: () => Date;

    /** One new launch template version per (template, AMI) for this controller's lifetime */
    private readonly launchTemplateVersions = new Map<string, Promise<string>>();

    constructor(private readonly props: RolloutControllerProps) {
        this.eksClient = props.eksClient ?? new EKSClient({});
        this.ec2Client = props.ec2Client ?? new EC2Client({});
        this.logger = props.logger ?? createLogger('rollout-controller');
        this.now = props.now ?? (() => new Date());
    }

    // =========================================================================
    // RUN
    // =========================================================================

    /**
     * Apply `ami` to every target with at most `concurrencyLimit` in flight.
     * Outcomes are returned in target order.
     */
    async runRollout(
        targets: readonly TargetNodeGroup[],
        ami: AmiReference,
        options: RunRolloutOptions = {},
    ): Promise<RolloutOutcome[]> {
        const limit = this.props.concurrencyLimit ?? ROLLOUT_DEFAULTS.concurrencyLimit;
        const outcomes: RolloutOutcome[] = [];
        let next = 0;

        const worker = async (): Promise<void> => {
            while (next < targets.length) {
                const index = next++;
                const target = targets[index];
                if (options.signal?.aborted) {
                    outcomes[index] = skipped(target, 'Cancelled', 'Run cancelled before this node group started');
                    continue;
                }
                outcomes[index] = await this.applyRolloutIsolated(target, ami, options.signal);
            }
        };

        const workerCount = Math.min(limit, targets.length);
        await Promise.all(Array.from({ length: workerCount }, () => worker()));
        return outcomes;
    }

    /**
     * applyRollout, with any unexpected throw (e.g. the state store being
     * unreachable) turned into a failed outcome for this node group only.
     */
    private async applyRolloutIsolated(
        target: TargetNodeGroup,
        ami: AmiReference,
        signal?: AbortSignal,
    ): Promise<RolloutOutcome> {
        try {
            return await this.applyRollout(target, ami, signal);
        } catch (error) {
            this.logger.error('Rollout aborted unexpectedly', { nodegroup: nodeGroupId(target), error });
            return {
                status: 'failed',
                target: { clusterName: target.clusterName, nodegroupName: target.nodegroupName },
                imageId: ami.imageId,
                error: { kind: RolloutErrorKind.UPDATE_FAILED, message: errorMessage(error) },
            };
        }
    }

    // =========================================================================
    // SINGLE NODE GROUP
    // =========================================================================

    /**
     * @param signal - once aborted, stops waiting on the update and leaves the
     *   record InProgress for a later run to settle
     */
    async applyRollout(target: TargetNodeGroup, ami: AmiReference, signal?: AbortSignal): Promise<RolloutOutcome> {
        const { store } = this.props;
        const log = this.logger.child({ nodegroup: nodeGroupId(target), imageId: ami.imageId });

        let record = await store.get(target);

        if (record && this.hasOpenUpdate(record)) {
            const settlement = await this.settle(target, record, log);
            switch (settlement.state) {
                case 'busy':
                    log.info('Node group already has a rollout in progress', { detail: settlement.detail });
                    return skipped(target, 'ConcurrentModification', settlement.detail);
                case 'timedOut':
                    return {
                        status: 'failed',
                        target: { clusterName: target.clusterName, nodegroupName: target.nodegroupName },
                        imageId: settlement.record.targetAmi?.imageId ?? ami.imageId,
                        error: settlement.error,
                    };
                case 'continue':
                    record = settlement.record;
                    break;
            }
        }

        if (record?.lastAppliedAmi) {
            if (record.lastAppliedAmi.imageId === ami.imageId) {
                log.debug('Node group already on this AMI');
                return skipped(target, 'UpToDate');
            }
            if (isOlderAmi(ami, record.lastAppliedAmi)) {
                log.warn('Refusing to move node group to an older AMI', {
                    lastAppliedImageId: record.lastAppliedAmi.imageId,
                });
                return skipped(target, 'Superseded', `Node group already on newer ${record.lastAppliedAmi.imageId}`);
            }
        }

        if (
            record?.status === RolloutStatus.FAILED &&
            record.error &&
            !isRetryable(record.error.kind) &&
            record.targetAmi?.imageId === ami.imageId
        ) {
            log.warn('Previous attempt was rejected, waiting for operator', { error: record.error });
            return skipped(target, 'AwaitingOperator', record.error.message);
        }

        // -----------------------------------------------------------------
        // Claim the node group
        // -----------------------------------------------------------------
        const claimed: RolloutRecord = {
            clusterName: target.clusterName,
            nodegroupName: target.nodegroupName,
            status: RolloutStatus.IN_PROGRESS,
            lastAppliedAmi: record?.lastAppliedAmi,
            targetAmi: ami,
            lastAttemptAt: this.now().toISOString(),
            revision: (record?.revision ?? 0) + 1,
        };

        if (!(await store.compareAndSet(target, record?.revision, claimed))) {
            log.info('Another run claimed the node group first');
            return skipped(target, 'ConcurrentModification', 'Claimed by a concurrent run');
        }

        log.info('Rollout started', { fromImageId: record?.lastAppliedAmi?.imageId });

        let launchTemplateVersion: string | undefined;
        let updateId: string | undefined;
        try {
            launchTemplateVersion = await this.launchTemplateVersionFor(target, ami);
            updateId = await this.updateNodegroup(target, launchTemplateVersion);
            log.info('Node group update issued', { launchTemplateVersion, updateId });

            const completion = await this.waitForUpdate(target, updateId, signal);
            if (completion === 'detached') {
                await this.finish(target, claimed, {
                    ...claimed,
                    launchTemplateVersion,
                    updateId,
                    revision: claimed.revision + 1,
                }, log);
                log.warn('Run cancelled while the update was running; record left InProgress', { updateId });
                return skipped(target, 'Cancelled', `Update ${updateId} still running when the run was cancelled`);
            }

            await this.finish(target, claimed, {
                ...claimed,
                status: RolloutStatus.SUCCEEDED,
                lastAppliedAmi: ami,
                launchTemplateVersion,
                updateId,
                revision: claimed.revision + 1,
            }, log);

            log.info('Rollout succeeded', { launchTemplateVersion, updateId });
            return {
                status: 'succeeded',
                target: { clusterName: target.clusterName, nodegroupName: target.nodegroupName },
                imageId: ami.imageId,
                launchTemplateVersion,
                updateId,
            };
        } catch (error) {
            const failure = classifyMutationError(error, 'Rollout');
            const recorded = { kind: failure.kind, message: failure.message };

            await this.finish(target, claimed, {
                ...claimed,
                status: RolloutStatus.FAILED,
                error: recorded,
                launchTemplateVersion,
                updateId,
                revision: claimed.revision + 1,
            }, log);

            if (failure.kind === RolloutErrorKind.ROLLOUT_REJECTED) {
                log.error('Rollout rejected, operator attention required', { error: failure });
            } else {
                log.error('Rollout failed', { error: failure });
            }
            return {
                status: 'failed',
                target: { clusterName: target.clusterName, nodegroupName: target.nodegroupName },
                imageId: ami.imageId,
                error: recorded,
            };
        }
    }

    // =========================================================================
    // RECORD TRANSITIONS
    // =========================================================================

    /**
     * InProgress records, and timed-out ones whose update EKS may still be
     * running, need checking before the node group can be claimed again.
     */
    private hasOpenUpdate(record: RolloutRecord): boolean {
        if (record.status === RolloutStatus.IN_PROGRESS) return true;
        return (
            record.status === RolloutStatus.FAILED &&
            record.error?.kind === RolloutErrorKind.ROLLOUT_TIMEOUT &&
            record.updateId !== undefined
        );
    }

    /**
     * Resolve a record left by an earlier run. A recorded update id is always
     * checked with EKS first; age decides only when there is nothing to check.
     */
    private async settle(target: NodeGroupKey, record: RolloutRecord, log: Logger): Promise<Settlement> {
        const inProgress = record.status === RolloutStatus.IN_PROGRESS;
        const busy: Settlement = { state: 'busy', detail: `In progress since ${record.lastAttemptAt}` };

        if (!record.updateId) {
            if (!this.isStale(record)) return busy;
            const reset = await this.resetStale(
                target,
                record,
                `InProgress since ${record.lastAttemptAt} exceeded the stale timeout`,
                log,
            );
            return reset ? { state: 'continue', record: reset } : busy;
        }

        const { updateId } = record;
        const update = await this.lookupUpdate(target, updateId);

        if (update.state === 'missing') {
            if (!inProgress) return { state: 'continue', record };
            const reset = await this.resetStale(target, record, `Update ${updateId} is no longer known to EKS`, log);
            return reset ? { state: 'continue', record: reset } : busy;
        }
        if (update.state === 'unreadable') {
            return { state: 'busy', detail: `Update ${updateId} could not be checked` };
        }

        if (update.status === UpdateStatus.SUCCESSFUL && record.targetAmi) {
            const settled: RolloutRecord = {
                ...record,
                status: RolloutStatus.SUCCEEDED,
                lastAppliedAmi: record.targetAmi,
                error: undefined,
                revision: record.revision + 1,
            };
            if (!(await this.props.store.compareAndSet(target, record.revision, settled))) return busy;
            log.info('Recorded update finished after an earlier run ended', { updateId });
            return { state: 'continue', record: settled };
        }

        if (update.status === UpdateStatus.FAILED || update.status === UpdateStatus.CANCELLED) {
            if (!inProgress) return { state: 'continue', record };
            const settled: RolloutRecord = {
                ...record,
                status: RolloutStatus.FAILED,
                error: { kind: RolloutErrorKind.UPDATE_FAILED, message: update.detail },
                revision: record.revision + 1,
            };
            if (!(await this.props.store.compareAndSet(target, record.revision, settled))) return busy;
            log.warn('Recorded update that failed after an earlier run ended', { updateId });
            return { state: 'continue', record: settled };
        }

        // Still running
        if (!inProgress) {
            return { state: 'busy', detail: `Update ${updateId} still running` };
        }
        if (!this.exceededRolloutTimeout(record)) {
            return busy;
        }

        const timeoutSeconds = this.props.rolloutTimeoutSeconds ?? ROLLOUT_DEFAULTS.rolloutTimeoutSeconds;
        const error: RecordedError = {
            kind: RolloutErrorKind.ROLLOUT_TIMEOUT,
            message: `Update ${updateId} on ${nodeGroupId(target)} did not finish within ${timeoutSeconds}s`,
        };
        const timedOut: RolloutRecord = {
            ...record,
            status: RolloutStatus.FAILED,
            error,
            revision: record.revision + 1,
        };
        if (!(await this.props.store.compareAndSet(target, record.revision, timedOut))) return busy;
        log.error('Rollout failed', { error });
        return { state: 'timedOut', record: timedOut, error };
    }

    private isStale(record: RolloutRecord): boolean {
        const staleSeconds = this.props.staleInProgressSeconds ?? ROLLOUT_DEFAULTS.staleInProgressSeconds;
        return this.ageMs(record) > staleSeconds * 1000;
    }

    private exceededRolloutTimeout(record: RolloutRecord): boolean {
        const timeoutSeconds = this.props.rolloutTimeoutSeconds ?? ROLLOUT_DEFAULTS.rolloutTimeoutSeconds;
        return this.ageMs(record) > timeoutSeconds * 1000;
    }

    private ageMs(record: RolloutRecord): number {
        return this.now().getTime() - Date.parse(record.lastAttemptAt);
    }

    private async resetStale(
        target: NodeGroupKey,
        record: RolloutRecord,
        message: string,
        log: Logger,
    ): Promise<RolloutRecord | undefined> {
        const reset: RolloutRecord = {
            ...record,
            status: RolloutStatus.FAILED,
            error: { kind: RolloutErrorKind.STALE_IN_PROGRESS, message },
            revision: record.revision + 1,
        };
        if (!(await this.props.store.compareAndSet(target, record.revision, reset))) {
            return undefined;
        }
        log.warn('Reset stale InProgress record to Failed', { lastAttemptAt: record.lastAttemptAt, reason: message });
        return reset;
    }

    private async finish(
        target: NodeGroupKey,
        claimed: RolloutRecord,
        next: RolloutRecord,
        log: Logger,
    ): Promise<void> {
        const written = await this.props.store.compareAndSet(target, claimed.revision, next);
        if (!written) {
            log.warn('Rollout record changed while the update ran; keeping the newer record', {
                status: next.status,
            });
        }
    }

    // =========================================================================
    // AWS CALLS
    // =========================================================================

    /**
     * Node groups sharing a launch template share one new version per AMI.
     */
    private launchTemplateVersionFor(target: TargetNodeGroup, ami: AmiReference): Promise<string> {
        const key = `${target.launchTemplateId}:${ami.imageId}`;
        let version = this.launchTemplateVersions.get(key);
        if (!version) {
            version = this.createLaunchTemplateVersion(target, ami);
            this.launchTemplateVersions.set(key, version);
        }
        return version;
    }

    private async createLaunchTemplateVersion(target: TargetNodeGroup, ami: AmiReference): Promise<string> {
        let versionNumber: number | undefined;
        try {
            const response = await this.ec2Client.send(
                new CreateLaunchTemplateVersionCommand({
                    LaunchTemplateId: target.launchTemplateId,
                    SourceVersion: target.launchTemplateVersion,
                    VersionDescription: `Hardened AMI ${ami.imageId}`,
                    LaunchTemplateData: {
                        ImageId: ami.imageId,
                        UserData: renderUserData(target, this.props.nodeOsFamily),
                    },
                }),
            );
            versionNumber = response.LaunchTemplateVersion?.VersionNumber;
        } catch (error) {
            throw classifyMutationError(error, `CreateLaunchTemplateVersion on ${target.launchTemplateId}`);
        }

        if (versionNumber === undefined) {
            throw new UpdateFailedError(`CreateLaunchTemplateVersion on ${target.launchTemplateId} returned no version`);
        }
        return String(versionNumber);
    }

    private async updateNodegroup(target: TargetNodeGroup, version: string): Promise<string> {
        let updateId: string | undefined;
        try {
            const response = await this.eksClient.send(
                new UpdateNodegroupVersionCommand({
                    clusterName: target.clusterName,
                    nodegroupName: target.nodegroupName,
                    launchTemplate: { id: target.launchTemplateId, version },
                }),
            );
            updateId = response.update?.id;
        } catch (error) {
            throw classifyMutationError(error, `UpdateNodegroupVersion on ${nodeGroupId(target)}`);
        }

        if (!updateId) {
            throw new UpdateFailedError(`UpdateNodegroupVersion on ${nodeGroupId(target)} returned no update id`);
        }
        return updateId;
    }

    private async lookupUpdate(target: NodeGroupKey, updateId: string): Promise<UpdateLookup> {
        try {
            const { update } = await this.eksClient.send(
                new DescribeUpdateCommand({
                    name: target.clusterName,
                    nodegroupName: target.nodegroupName,
                    updateId,
                }),
            );
            return {
                state: 'found',
                status: update?.status,
                detail: describeFailure(updateId, update?.status, update?.errors ?? []),
            };
        } catch (error) {
            if (error instanceof Error && error.name === 'ResourceNotFoundException') {
                return { state: 'missing' };
            }
            this.logger.warn('DescribeUpdate failed', { nodegroup: nodeGroupId(target), updateId, error });
            return { state: 'unreadable' };
        }
    }

    /**
     * Poll DescribeUpdate with exponential backoff until Successful,
     * Failed/Cancelled, or the rollout timeout. Resolves 'detached' when
     * `signal` aborts first.
     */
    private async waitForUpdate(
        target: TargetNodeGroup,
        updateId: string,
        signal?: AbortSignal,
    ): Promise<'completed' | 'detached'> {
        const maxWaitTime = this.props.rolloutTimeoutSeconds ?? ROLLOUT_DEFAULTS.rolloutTimeoutSeconds;
        let failureDetail = '';

        const result = await createWaiter<EKSClient, DescribeUpdateCommandInput>(
            {
                client: this.eksClient,
                maxWaitTime,
                minDelay: this.props.pollMinDelaySeconds ?? ROLLOUT_DEFAULTS.pollMinDelaySeconds,
                maxDelay: this.props.pollMaxDelaySeconds ?? ROLLOUT_DEFAULTS.pollMaxDelaySeconds,
                abortSignal: signal,
            },
            { name: target.clusterName, nodegroupName: target.nodegroupName, updateId },
            async (client, input) => {
                try {
                    const { update } = await client.send(new DescribeUpdateCommand(input));
                    switch (update?.status) {
                        case UpdateStatus.SUCCESSFUL:
                            return { state: WaiterState.SUCCESS };
                        case UpdateStatus.FAILED:
                        case UpdateStatus.CANCELLED:
                            failureDetail = describeFailure(updateId, update?.status, update?.errors ?? []);
                            return { state: WaiterState.FAILURE };
                        default:
                            return { state: WaiterState.RETRY };
                    }
                } catch (error) {
                    if (isClientRejection(error)) {
                        throw error;
                    }
                    this.logger.warn('DescribeUpdate failed, retrying', { nodegroup: nodeGroupId(target), error });
                    return { state: WaiterState.RETRY };
                }
            },
        );

        switch (result.state) {
            case WaiterState.SUCCESS:
                return 'completed';
            case WaiterState.ABORTED:
                return 'detached';
            case WaiterState.TIMEOUT:
                throw new RolloutTimeoutError(
                    `Update ${updateId} on ${nodeGroupId(target)} did not finish within ${maxWaitTime}s`,
                );
            default:
                throw new UpdateFailedError(failureDetail || `Update ${updateId} ended in state ${result.state}`);
        }
    }
}
