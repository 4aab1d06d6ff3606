/**
 * @format
 * Rollout error types
 *
 * Every failure the rollout path can record carries a `kind` so outcomes,
 * DynamoDB records and alerts agree on one vocabulary.
 */

import { RolloutErrorKind } from '../rollout/types';

export class RolloutError extends Error {
    constructor(
        public readonly kind: RolloutErrorKind,
        message: string,
        options?: { cause?: unknown },
    ) {
        super(message, options);
        this.name = kind;
    }
}

/** The AMI parameter could not be read. Retried on the next cycle. */
export class SourceUnavailableError extends RolloutError {
    constructor(message: string, options?: { cause?: unknown }) {
        super(RolloutErrorKind.SOURCE_UNAVAILABLE, message, options);
    }
}

/** One cluster could not be described; it is left out of the run. */
export class ClusterLookupFailedError extends RolloutError {
    constructor(
        public readonly clusterName: string,
        message: string,
        options?: { cause?: unknown },
    ) {
        super(RolloutErrorKind.CLUSTER_LOOKUP_FAILED, message, options);
    }
}

/** Not a single cluster could be resolved. Fails the whole run. */
export class NoClustersResolvableError extends RolloutError {
    constructor(message: string, options?: { cause?: unknown }) {
        super(RolloutErrorKind.NO_CLUSTERS_RESOLVABLE, message, options);
    }
}

export class RolloutTimeoutError extends RolloutError {
    constructor(message: string) {
        super(RolloutErrorKind.ROLLOUT_TIMEOUT, message);
    }
}

/** EKS or EC2 refused the change (permissions, validation). Needs an operator. */
export class RolloutRejectedError extends RolloutError {
    constructor(message: string, options?: { cause?: unknown }) {
        super(RolloutErrorKind.ROLLOUT_REJECTED, message, options);
    }
}

/** The node group update ended Failed/Cancelled, or a transient API error hit. */
export class UpdateFailedError extends RolloutError {
    constructor(message: string, options?: { cause?: unknown }) {
        super(RolloutErrorKind.UPDATE_FAILED, message, options);
    }
}

// =============================================================================
// SDK ERROR CLASSIFICATION
// =============================================================================

const THROTTLING_ERRORS = new Set([
    'ThrottlingException',
    'Throttling',
    'RequestLimitExceeded',
    'TooManyRequestsException',
]);

/**
 * SDK v3 service exceptions expose `$fault`. Client faults other than
 * throttling mean the request itself was refused.
 */
export function isClientRejection(error: unknown): boolean {
    if (typeof error !== 'object' || error === null || !('$fault' in error)) {
        return false;
    }
    const name = error instanceof Error ? error.name : '';
    return error.$fault === 'client' && !THROTTLING_ERRORS.has(name);
}

export function errorMessage(error: unknown): string {
    return error instanceof Error ? error.message : String(error);
}

/**
 * Map an SDK failure from a mutating call onto the rollout vocabulary.
 */
export function classifyMutationError(error: unknown, action: string): RolloutError {
    if (error instanceof RolloutError) {
        return error;
    }
    const name = error instanceof Error ? error.name : 'Error';
    const message = `${action} failed: ${name}: ${errorMessage(error)}`;
    if (isClientRejection(error)) {
        return new RolloutRejectedError(message, { cause: error });
    }
    return new UpdateFailedError(message, { cause: error });
}
