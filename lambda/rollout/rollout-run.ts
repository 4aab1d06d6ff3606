/**
 * @format
 * Rollout Run
 *
 * One end-to-end execution of watch → select → apply:
 * 1. Pick the AMI: the one an Image Builder notification announced, else the
 *    watcher's view of the SSM parameter, else the last recorded AMI
 * 2. Resolve target node groups from the cluster tag filter
 * 3. Roll the AMI out with bounded concurrency
 * 4. Summarise, log, and alert when anything failed
 *
 * Only a total failure to resolve clusters propagates; everything else is
 * reported in the summary.
 */

import { AlertPublisher } from '../shared/alerts';
import { SourceUnavailableError } from '../shared/errors';
import { Logger, createLogger } from '../shared/logger';
import { AmiWatcher } from './ami-watcher';
import { ClusterSelector } from './cluster-selector';
import { RolloutController } from './rollout-controller';
import {
    AmiReference,
    ClusterTagFilter,
    RolloutErrorKind,
    RolloutOutcome,
    RunError,
    RunSummary,
    SkippedNodeGroup,
} from './types';

export interface RolloutRunDeps {
    readonly watcher: AmiWatcher;
    readonly selector: ClusterSelector;
    readonly controller: RolloutController;
    readonly alerts?: AlertPublisher;
    readonly logger?: Logger;
}

export interface RolloutRunOptions {
    readonly clusterTags: ClusterTagFilter;
    /** AMI announced by Image Builder; bypasses the SSM lookup */
    readonly explicitAmi?: AmiReference;
    /** Stops new node groups from starting once aborted */
    readonly signal?: AbortSignal;
}

export function buildRunSummary(
    ami: AmiReference | undefined,
    outcomes: readonly RolloutOutcome[],
    runErrors: readonly RunError[],
): RunSummary {
    const succeeded = outcomes.filter((o) => o.status === 'succeeded');
    const failed = outcomes.filter((o) => o.status === 'failed');
    const skipped = outcomes.filter((o) => o.status === 'skipped');

    const nodeGroupErrors: RunError[] = [];
    for (const outcome of failed) {
        if (outcome.status === 'failed') {
            nodeGroupErrors.push({
                kind: outcome.error.kind,
                message: outcome.error.message,
                clusterName: outcome.target.clusterName,
                nodegroupName: outcome.target.nodegroupName,
            });
        }
    }

    return {
        ami,
        counts: {
            succeeded: succeeded.length,
            failed: failed.length,
            skipped: skipped.length,
        },
        succeeded,
        failed,
        skipped,
        errors: [...runErrors, ...nodeGroupErrors],
    };
}

function selectorSkip(entry: SkippedNodeGroup): RolloutOutcome {
    return {
        status: 'skipped',
        target: { clusterName: entry.clusterName, nodegroupName: entry.nodegroupName },
        reason: entry.reason,
        ...(entry.detail !== undefined && { detail: entry.detail }),
    };
}

async function resolveAmi(
    watcher: AmiWatcher,
    explicitAmi: AmiReference | undefined,
    errors: RunError[],
    logger: Logger,
): Promise<AmiReference | undefined> {
    if (explicitAmi) {
        return explicitAmi;
    }

    const lastKnown = await watcher.lastKnown();

    try {
        return (await watcher.checkForUpdate(lastKnown)) ?? lastKnown;
    } catch (error) {
        if (!(error instanceof SourceUnavailableError)) {
            throw error;
        }
        logger.warn('AMI source unavailable, continuing with last known AMI', {
            error,
            lastKnownImageId: lastKnown?.imageId,
        });
        errors.push({ kind: error.kind, message: error.message });
        return lastKnown;
    }
}

export async function executeRolloutRun(
    deps: RolloutRunDeps,
    options: RolloutRunOptions,
): Promise<RunSummary> {
    const logger = deps.logger ?? createLogger('rollout-run');
    const errors: RunError[] = [];

    const ami = await resolveAmi(deps.watcher, options.explicitAmi, errors, logger);
    if (!ami) {
        logger.info('No AMI available yet, nothing to roll out', { parameterName: deps.watcher.parameterName });
        return buildRunSummary(undefined, [], errors);
    }

    await deps.watcher.recordObserved(ami);

    const resolved = await deps.selector.resolveTargets(options.clusterTags);
    errors.push(...resolved.errors);

    const outcomes = await deps.controller.runRollout(resolved.targets, ami, { signal: options.signal });
    const summary = buildRunSummary(ami, [...outcomes, ...resolved.skipped.map(selectorSkip)], errors);

    logger.info('Rollout run complete', {
        imageId: ami.imageId,
        counts: summary.counts,
        errors: summary.errors,
    });

    if (deps.alerts && summary.errors.length > 0) {
        await publishAlert(deps.alerts, summary, logger);
    }

    return summary;
}

async function publishAlert(alerts: AlertPublisher, summary: RunSummary, logger: Logger): Promise<void> {
    const rejected = summary.errors.filter((e) => e.kind === RolloutErrorKind.ROLLOUT_REJECTED);
    const subject = rejected.length > 0
        ? `AMI rollout rejected for ${rejected.length} node group(s): operator action required`
        : `AMI rollout completed with ${summary.errors.length} error(s)`;

    try {
        await alerts.publish(subject, {
            Message: subject,
            'AMI ID': summary.ami?.imageId,
            Counts: summary.counts,
            Errors: summary.errors,
        });
    } catch (error) {
        logger.error('Failed to publish rollout alert', { error });
    }
}
