/**
 * @format
 * AMI Watcher
 *
 * Reads the hardened AMI id that the Image Builder distribution writes to
 * SSM and reports whether it differs from the last value this system acted
 * on. The "last known" value lives in the state store as a versioned
 * SourceRecord, so concurrent invocations agree on it.
 */

import { GetParameterCommand, SSMClient } from '@aws-sdk/client-ssm';

import { SourceUnavailableError, errorMessage } from '../shared/errors';
import { Logger, createLogger } from '../shared/logger';
import { RolloutStateStore } from './state-store';
import { AmiReference, isOlderAmi } from './types';

/** Value the pipeline construct seeds the parameter with before the first build */
export const AMI_PARAMETER_PLACEHOLDER = 'PENDING_FIRST_BUILD';

const AMI_ID_PATTERN = /^ami-[0-9a-f]{8,17}$/;

export interface AmiWatcherProps {
    readonly parameterName: string;
    readonly store: RolloutStateStore;
    readonly ssmClient?: SSMClient;
    readonly logger?: Logger;
    readonly now?: () => Date;
}

export class AmiWatcher {
    private readonly ssmClient: SSMClient;
    private readonly logger: Logger;
    private readonly now: () => Date;

    constructor(private readonly props: AmiWatcherProps) {
        this.ssmClient = props.ssmClient ?? new SSMClient({});
        this.logger = props.logger ?? createLogger('ami-watcher');
        this.now = props.now ?? (() => new Date());
    }

    get parameterName(): string {
        return this.props.parameterName;
    }

    /**
     * Read the current AMI from SSM.
     * @throws SourceUnavailableError when the parameter is missing, unset or unreadable
     */
    async readCurrent(): Promise<AmiReference> {
        const { parameterName } = this.props;

        let value: string | undefined;
        let lastModified: Date | undefined;
        try {
            const response = await this.ssmClient.send(new GetParameterCommand({ Name: parameterName }));
            value = response.Parameter?.Value;
            lastModified = response.Parameter?.LastModifiedDate;
        } catch (error) {
            throw new SourceUnavailableError(
                `Unable to read AMI parameter ${parameterName}: ${errorMessage(error)}`,
                { cause: error },
            );
        }

        if (!value || value === AMI_PARAMETER_PLACEHOLDER) {
            throw new SourceUnavailableError(`AMI parameter ${parameterName} has no image id yet`);
        }
        if (!AMI_ID_PATTERN.test(value)) {
            throw new SourceUnavailableError(`AMI parameter ${parameterName} holds '${value}', not an AMI id`);
        }

        return {
            imageId: value,
            discoveredAt: (lastModified ?? this.now()).toISOString(),
        };
    }

    /**
     * Returns the current AMI only if its id differs from `currentKnownAmi`.
     * Read-only.
     */
    async checkForUpdate(currentKnownAmi?: AmiReference): Promise<AmiReference | undefined> {
        const latest = await this.readCurrent();
        if (currentKnownAmi && latest.imageId === currentKnownAmi.imageId) {
            this.logger.debug('AMI unchanged', { imageId: latest.imageId });
            return undefined;
        }
        this.logger.info('New AMI detected', {
            imageId: latest.imageId,
            previousImageId: currentKnownAmi?.imageId,
        });
        return latest;
    }

    /** Last AMI recorded for this parameter */
    async lastKnown(): Promise<AmiReference | undefined> {
        const record = await this.props.store.getSource(this.props.parameterName);
        return record?.current;
    }

    /**
     * Advance the persisted last-known AMI. Never moves it backwards; a
     * concurrent writer winning the race leaves its value in place.
     */
    async recordObserved(ami: AmiReference): Promise<boolean> {
        const { store, parameterName } = this.props;
        const existing = await store.getSource(parameterName);

        if (existing && (existing.current.imageId === ami.imageId || isOlderAmi(ami, existing.current))) {
            return false;
        }

        const written = await store.compareAndSetSource(existing?.revision, {
            parameterName,
            current: ami,
            revision: (existing?.revision ?? 0) + 1,
        });
        if (!written) {
            this.logger.warn('Source record changed concurrently, keeping the stored AMI', {
                parameterName,
                imageId: ami.imageId,
            });
        }
        return written;
    }
}
