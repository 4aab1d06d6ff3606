/**
 * @format
 * AMI Watcher - Unit Tests
 */

import { GetParameterCommand, SSMClient } from '@aws-sdk/client-ssm';
import { mockClient } from 'aws-sdk-client-mock';
import 'aws-sdk-client-mock-jest';

import { AMI_PARAMETER_PLACEHOLDER, AmiWatcher } from '../../../../lambda/rollout/ami-watcher';
import { SourceUnavailableError } from '../../../../lambda/shared/errors';
import { RolloutErrorKind } from '../../../../lambda/rollout/types';
import { AMI_PARAMETER, InMemoryStateStore, NEW_AMI, OLD_AMI } from '../../../fixtures';

const ssmMock = mockClient(SSMClient);

const MODIFIED = new Date('2024-06-01T00:00:00.000Z');

function parameterValue(value: string | undefined, lastModified: Date | undefined = MODIFIED): void {
    ssmMock.on(GetParameterCommand).resolves({
        Parameter: { Name: AMI_PARAMETER, Value: value, LastModifiedDate: lastModified },
    });
}

describe('AmiWatcher', () => {
    let store: InMemoryStateStore;
    let watcher: AmiWatcher;

    beforeEach(() => {
        ssmMock.reset();
        store = new InMemoryStateStore();
        watcher = new AmiWatcher({
            parameterName: AMI_PARAMETER,
            store,
            ssmClient: new SSMClient({}),
            now: () => new Date('2024-07-01T12:00:00.000Z'),
        });
    });

    describe('checkForUpdate', () => {
        it('reports a new AMI once, then nothing while the parameter is unchanged', async () => {
            parameterValue(NEW_AMI.imageId);

            const first = await watcher.checkForUpdate(OLD_AMI);
            expect(first).toEqual({ imageId: NEW_AMI.imageId, discoveredAt: '2024-06-01T00:00:00.000Z' });

            const second = await watcher.checkForUpdate(first);
            expect(second).toBeUndefined();

            expect(ssmMock).toHaveReceivedCommandWith(GetParameterCommand, { Name: AMI_PARAMETER });
        });

        it('reports the current AMI when nothing is known yet', async () => {
            parameterValue(NEW_AMI.imageId);

            await expect(watcher.checkForUpdate(undefined)).resolves.toEqual({
                imageId: NEW_AMI.imageId,
                discoveredAt: '2024-06-01T00:00:00.000Z',
            });
        });

        it('stamps the reference with now when SSM gives no modification date', async () => {
            ssmMock.on(GetParameterCommand).resolves({ Parameter: { Name: AMI_PARAMETER, Value: NEW_AMI.imageId } });

            await expect(watcher.readCurrent()).resolves.toEqual({
                imageId: NEW_AMI.imageId,
                discoveredAt: '2024-07-01T12:00:00.000Z',
            });
        });

        it('signals SourceUnavailable before the first build', async () => {
            parameterValue(AMI_PARAMETER_PLACEHOLDER);

            const error = await watcher.checkForUpdate(OLD_AMI).catch((e: unknown) => e);
            expect(error).toBeInstanceOf(SourceUnavailableError);
            expect(error).toMatchObject({
                kind: RolloutErrorKind.SOURCE_UNAVAILABLE,
                message: `AMI parameter ${AMI_PARAMETER} has no image id yet`,
            });
        });

        it('signals SourceUnavailable when the value is not an AMI id', async () => {
            parameterValue('not-an-ami');

            await expect(watcher.readCurrent()).rejects.toThrow(
                `AMI parameter ${AMI_PARAMETER} holds 'not-an-ami', not an AMI id`,
            );
        });

        it('signals SourceUnavailable when SSM cannot be read', async () => {
            ssmMock.on(GetParameterCommand).rejects(new Error('ParameterNotFound'));

            await expect(watcher.checkForUpdate(OLD_AMI)).rejects.toThrow(
                `Unable to read AMI parameter ${AMI_PARAMETER}: ParameterNotFound`,
            );
        });
    });

    describe('recordObserved', () => {
        it('stores the first observed AMI', async () => {
            await expect(watcher.recordObserved(OLD_AMI)).resolves.toBe(true);
            await expect(watcher.lastKnown()).resolves.toEqual(OLD_AMI);
        });

        it('advances to a newer AMI', async () => {
            await watcher.recordObserved(OLD_AMI);
            await expect(watcher.recordObserved(NEW_AMI)).resolves.toBe(true);

            expect(await store.getSource(AMI_PARAMETER)).toEqual({
                parameterName: AMI_PARAMETER,
                current: NEW_AMI,
                revision: 2,
            });
        });

        it('never moves back to an older AMI', async () => {
            await watcher.recordObserved(NEW_AMI);
            await expect(watcher.recordObserved(OLD_AMI)).resolves.toBe(false);
            await expect(watcher.lastKnown()).resolves.toEqual(NEW_AMI);
        });

        it('keeps the stored value when a concurrent writer wins', async () => {
            await watcher.recordObserved(OLD_AMI);
            jest.spyOn(store, 'compareAndSetSource').mockResolvedValueOnce(false);

            await expect(watcher.recordObserved(NEW_AMI)).resolves.toBe(false);
            await expect(watcher.lastKnown()).resolves.toEqual(OLD_AMI);
        });
    });
});
