/**
 * @format
 * Node bootstrap user data
 *
 * Custom-AMI node groups must bootstrap themselves, so every new launch
 * template version carries user data that joins the node to its cluster:
 * - Amazon Linux 2023: a nodeadm NodeConfig document
 * - Amazon Linux 2: a MIME multipart document calling /etc/eks/bootstrap.sh
 *
 * @see https://docs.aws.amazon.com/eks/latest/userguide/launch-templates.html
 */

import { NodeOsFamily } from './config';
import { TargetNodeGroup } from './types';

const MIME_BOUNDARY = '==BOUNDARY==';

export function renderNodeConfig(target: TargetNodeGroup): string {
    const { cluster } = target;
    return [
        '---',
        'apiVersion: node.eks.aws/v1alpha1',
        'kind: NodeConfig',
        'spec:',
        '  cluster:',
        `    name: ${target.clusterName}`,
        `    apiServerEndpoint: ${cluster.endpoint}`,
        `    certificateAuthority: ${cluster.certificateAuthority}`,
        `    cidr: ${cluster.serviceIpv4Cidr}`,
    ].join('\n');
}

export function renderBootstrapScript(target: TargetNodeGroup): string {
    const { cluster } = target;
    return [
        'MIME-Version: 1.0',
        `Content-Type: multipart/mixed; boundary="${MIME_BOUNDARY}"`,
        '',
        `--${MIME_BOUNDARY}`,
        'Content-Type: text/x-shellscript; charset="us-ascii"',
        '',
        '#!/bin/bash',
        'set -ex',
        `/etc/eks/bootstrap.sh ${target.clusterName} \\`,
        `  --b64-cluster-ca ${cluster.certificateAuthority} \\`,
        `  --apiserver-endpoint ${cluster.endpoint} \\`,
        `  --dns-cluster-ip ${cluster.dnsClusterIp} \\`,
        '  --container-runtime containerd',
        '',
        `--${MIME_BOUNDARY}--`,
    ].join('\n');
}

/**
 * Render and base64-encode user data for a launch template version.
 */
export function renderUserData(target: TargetNodeGroup, osFamily: NodeOsFamily): string {
    const document = osFamily === NodeOsFamily.AL2 ? renderBootstrapScript(target) : renderNodeConfig(target);
    return Buffer.from(document, 'utf-8').toString('base64');
}
