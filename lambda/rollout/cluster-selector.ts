/**
 * @format
 * Cluster Selector
 *
 * Resolves which EKS managed node groups a rollout run should touch:
 * 1. List every cluster visible to the caller's credentials
 * 2. Keep clusters whose tags contain every filter pair (extra tags ignored)
 * 3. Expand each cluster to its node groups
 * 4. Keep node groups that run a custom AMI from a caller-supplied launch
 *    template and are ACTIVE; report the rest as skipped
 *
 * A cluster that cannot be described is reported and left out. Results are
 * sorted by cluster name, then node group name.
 */

import {
    Cluster,
    DescribeClusterCommand,
    DescribeNodegroupCommand,
    EKSClient,
    Nodegroup,
    paginateListClusters,
    paginateListNodegroups,
} from '@aws-sdk/client-eks';

import { ClusterLookupFailedError, NoClustersResolvableError, errorMessage } from '../shared/errors';
import { Logger, createLogger } from '../shared/logger';
import {
    ClusterConnection,
    ClusterTagFilter,
    RunError,
    SkippedNodeGroup,
    TargetNodeGroup,
} from './types';

export interface ResolvedTargets {
    readonly targets: TargetNodeGroup[];
    readonly skipped: SkippedNodeGroup[];
    readonly errors: RunError[];
}

/**
 * True when every filter pair is present among the cluster's tags.
 * An empty filter matches every cluster.
 */
export function matchesTagFilter(
    tags: Record<string, string> | undefined,
    filter: ClusterTagFilter,
): boolean {
    return filter.every(({ key, value }) => tags?.[key] === value);
}

/**
 * Cluster DNS service IP: the service CIDR's network address with the
 * last octet set to 10 (e.g. 10.100.0.0/16 → 10.100.0.10).
 */
export function deriveDnsClusterIp(serviceIpv4Cidr: string): string {
    const [network] = serviceIpv4Cidr.split('/');
    const octets = network.split('.');
    return [...octets.slice(0, -1), '10'].join('.');
}

function compareByName(
    a: { clusterName: string; nodegroupName: string },
    b: { clusterName: string; nodegroupName: string },
): number {
    return a.clusterName.localeCompare(b.clusterName) || a.nodegroupName.localeCompare(b.nodegroupName);
}

export class ClusterSelector {
    private readonly eksClient: EKSClient;
    private readonly logger: Logger;

    constructor(eksClient?: EKSClient, logger?: Logger) {
        this.eksClient = eksClient ?? new EKSClient({});
        this.logger = logger ?? createLogger('cluster-selector');
    }

    /**
     * @throws NoClustersResolvableError when clusters cannot be listed, or
     * every listed cluster failed lookup
     */
    async resolveTargets(filter: ClusterTagFilter): Promise<ResolvedTargets> {
        const clusterNames = await this.listClusters();

        const targets: TargetNodeGroup[] = [];
        const skipped: SkippedNodeGroup[] = [];
        const errors: RunError[] = [];

        for (const clusterName of [...clusterNames].sort()) {
            try {
                const cluster = await this.describeCluster(clusterName);
                if (!matchesTagFilter(cluster.tags, filter)) {
                    this.logger.debug('Cluster does not match tag filter', { clusterName });
                    continue;
                }

                const connection = this.toConnection(clusterName, cluster);
                const nodegroups = await this.describeNodegroups(clusterName);
                for (const nodegroup of nodegroups) {
                    const result = this.classifyNodegroup(clusterName, nodegroup, connection);
                    if ('reason' in result) {
                        skipped.push(result);
                    } else {
                        targets.push(result);
                    }
                }
            } catch (error) {
                const lookupError =
                    error instanceof ClusterLookupFailedError
                        ? error
                        : new ClusterLookupFailedError(
                              clusterName,
                              `Lookup of cluster ${clusterName} failed: ${errorMessage(error)}`,
                              { cause: error },
                          );
                this.logger.warn('Excluding cluster from rollout', {
                    clusterName,
                    error: lookupError,
                });
                errors.push({ kind: lookupError.kind, message: lookupError.message, clusterName });
            }
        }

        if (clusterNames.length > 0 && errors.length === clusterNames.length) {
            throw new NoClustersResolvableError(
                `All ${clusterNames.length} cluster lookups failed: ${errors.map((e) => e.message).join('; ')}`,
            );
        }

        targets.sort(compareByName);
        skipped.sort(compareByName);

        this.logger.info('Resolved rollout targets', {
            clusters: clusterNames.length,
            targets: targets.length,
            skipped: skipped.length,
            errors: errors.length,
        });

        return { targets, skipped, errors };
    }

    // =========================================================================
    // EKS LOOKUPS
    // =========================================================================

    private async listClusters(): Promise<string[]> {
        const names: string[] = [];
        try {
            for await (const page of paginateListClusters({ client: this.eksClient }, {})) {
                names.push(...(page.clusters ?? []));
            }
        } catch (error) {
            throw new NoClustersResolvableError(`Unable to list EKS clusters: ${errorMessage(error)}`, {
                cause: error,
            });
        }
        return names;
    }

    private async describeCluster(clusterName: string): Promise<Cluster> {
        const response = await this.eksClient.send(new DescribeClusterCommand({ name: clusterName }));
        if (!response.cluster) {
            throw new ClusterLookupFailedError(clusterName, `Cluster ${clusterName} not found`);
        }
        return response.cluster;
    }

    private async describeNodegroups(clusterName: string): Promise<Nodegroup[]> {
        const names: string[] = [];
        for await (const page of paginateListNodegroups({ client: this.eksClient }, { clusterName })) {
            names.push(...(page.nodegroups ?? []));
        }

        const nodegroups: Nodegroup[] = [];
        for (const nodegroupName of names) {
            const response = await this.eksClient.send(
                new DescribeNodegroupCommand({ clusterName, nodegroupName }),
            );
            if (response.nodegroup) {
                nodegroups.push(response.nodegroup);
            }
        }
        return nodegroups;
    }

    // =========================================================================
    // CLASSIFICATION
    // =========================================================================

    private toConnection(clusterName: string, cluster: Cluster): ClusterConnection {
        const endpoint = cluster.endpoint;
        const certificateAuthority = cluster.certificateAuthority?.data;
        const serviceIpv4Cidr = cluster.kubernetesNetworkConfig?.serviceIpv4Cidr;

        if (!endpoint || !certificateAuthority || !serviceIpv4Cidr) {
            throw new ClusterLookupFailedError(
                clusterName,
                `Cluster ${clusterName} is missing endpoint, certificate authority or IPv4 service CIDR`,
            );
        }

        return {
            endpoint,
            certificateAuthority,
            serviceIpv4Cidr,
            dnsClusterIp: deriveDnsClusterIp(serviceIpv4Cidr),
        };
    }

    private classifyNodegroup(
        clusterName: string,
        nodegroup: Nodegroup,
        connection: ClusterConnection,
    ): TargetNodeGroup | SkippedNodeGroup {
        const nodegroupName = nodegroup.nodegroupName ?? '';
        const launchTemplate = nodegroup.launchTemplate;

        if (!launchTemplate?.id || !launchTemplate.version) {
            return {
                clusterName,
                nodegroupName,
                reason: 'NoLaunchTemplate',
                detail: 'Node group does not use a caller-supplied launch template',
            };
        }

        const customAmi = nodegroup.amiType === 'CUSTOM' || (nodegroup.releaseVersion ?? '').startsWith('ami-');
        if (!customAmi) {
            return {
                clusterName,
                nodegroupName,
                reason: 'ManagedAmi',
                detail: `Node group uses EKS-managed AMI type ${nodegroup.amiType ?? 'unknown'}`,
            };
        }

        if (nodegroup.status !== 'ACTIVE') {
            return {
                clusterName,
                nodegroupName,
                reason: 'NotActive',
                detail: `Node group status is ${nodegroup.status ?? 'unknown'}`,
            };
        }

        return {
            clusterName,
            nodegroupName,
            launchTemplateId: launchTemplate.id,
            launchTemplateVersion: launchTemplate.version,
            cluster: connection,
        };
    }
}
