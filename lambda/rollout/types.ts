/**
 * @format
 * Rollout domain types
 *
 * Shared by the watcher, selector, controller and state store.
 */

// =============================================================================
// AMI
// =============================================================================

/**
 * One observed version of the hardened AMI.
 * Superseded by newer observations, never mutated.
 */
export interface AmiReference {
    readonly imageId: string;
    /** ISO-8601 time the image id was observed at the source */
    readonly discoveredAt: string;
}

/** True when `candidate` was observed strictly before `current` */
export function isOlderAmi(candidate: AmiReference, current: AmiReference): boolean {
    return Date.parse(candidate.discoveredAt) < Date.parse(current.discoveredAt);
}

// =============================================================================
// CLUSTER SELECTION
// =============================================================================

export interface ClusterTag {
    readonly key: string;
    readonly value: string;
}

/** Ordered key/value pairs, matched with logical AND */
export type ClusterTagFilter = readonly ClusterTag[];

/** Cluster connection details baked into node user data */
export interface ClusterConnection {
    readonly endpoint: string;
    readonly certificateAuthority: string;
    readonly serviceIpv4Cidr: string;
    readonly dnsClusterIp: string;
}

export interface NodeGroupKey {
    readonly clusterName: string;
    readonly nodegroupName: string;
}

export interface TargetNodeGroup extends NodeGroupKey {
    readonly launchTemplateId: string;
    readonly launchTemplateVersion: string;
    readonly cluster: ClusterConnection;
}

export type NodeGroupSkipReason =
    | 'NoLaunchTemplate'
    | 'ManagedAmi'
    | 'NotActive';

export interface SkippedNodeGroup extends NodeGroupKey {
    readonly reason: NodeGroupSkipReason;
    readonly detail?: string;
}

// =============================================================================
// ROLLOUT RECORDS
// =============================================================================

export enum RolloutStatus {
    PENDING = 'Pending',
    IN_PROGRESS = 'InProgress',
    SUCCEEDED = 'Succeeded',
    FAILED = 'Failed',
}

export enum RolloutErrorKind {
    SOURCE_UNAVAILABLE = 'SourceUnavailable',
    CLUSTER_LOOKUP_FAILED = 'ClusterLookupFailed',
    ROLLOUT_TIMEOUT = 'RolloutTimeout',
    ROLLOUT_REJECTED = 'RolloutRejected',
    CONCURRENT_MODIFICATION = 'ConcurrentModification',
    UPDATE_FAILED = 'UpdateFailed',
    STALE_IN_PROGRESS = 'StaleInProgress',
    NO_CLUSTERS_RESOLVABLE = 'NoClustersResolvable',
}

export interface RecordedError {
    readonly kind: RolloutErrorKind;
    readonly message: string;
}

export interface RolloutRecord extends NodeGroupKey {
    readonly status: RolloutStatus;
    /** Last AMI this node group was successfully moved to */
    readonly lastAppliedAmi?: AmiReference;
    /** AMI of the current or most recent attempt */
    readonly targetAmi?: AmiReference;
    readonly lastAttemptAt: string;
    readonly error?: RecordedError;
    readonly launchTemplateVersion?: string;
    readonly updateId?: string;
    /** Incremented on every write; guards conditional updates */
    readonly revision: number;
}

/** Persisted "last known AMI" for one watched SSM parameter */
export interface SourceRecord {
    readonly parameterName: string;
    readonly current: AmiReference;
    readonly revision: number;
}

// =============================================================================
// OUTCOMES
// =============================================================================

export type RolloutSkipReason =
    | 'UpToDate'
    | 'Superseded'
    | 'ConcurrentModification'
    | 'AwaitingOperator'
    | 'Cancelled';

export type RolloutOutcome =
    | {
          readonly status: 'succeeded';
          readonly target: NodeGroupKey;
          readonly imageId: string;
          readonly launchTemplateVersion: string;
          readonly updateId: string;
      }
    | {
          readonly status: 'failed';
          readonly target: NodeGroupKey;
          readonly imageId: string;
          readonly error: RecordedError;
      }
    | {
          readonly status: 'skipped';
          readonly target: NodeGroupKey;
          readonly reason: RolloutSkipReason | NodeGroupSkipReason;
          readonly detail?: string;
      };

export interface RunError {
    readonly kind: RolloutErrorKind;
    readonly message: string;
    readonly clusterName?: string;
    readonly nodegroupName?: string;
}

export interface RunSummary {
    readonly ami?: AmiReference;
    readonly counts: {
        readonly succeeded: number;
        readonly failed: number;
        readonly skipped: number;
    };
    readonly succeeded: RolloutOutcome[];
    readonly failed: RolloutOutcome[];
    readonly skipped: RolloutOutcome[];
    readonly errors: RunError[];
}

export function nodeGroupId(key: NodeGroupKey): string {
    return `${key.clusterName}/${key.nodegroupName}`;
}
