/**
 * @format
 * Node bootstrap user data - Unit Tests
 */

import { NodeOsFamily } from '../../../../lambda/rollout/config';
import { renderBootstrapScript, renderNodeConfig, renderUserData } from '../../../../lambda/rollout/user-data';
import { targetNodeGroup } from '../../../fixtures';

const target = targetNodeGroup('dev-cluster', 'workers');

describe('renderNodeConfig', () => {
    it('renders a nodeadm NodeConfig for the cluster', () => {
        expect(renderNodeConfig(target)).toBe(
            [
                '---',
                'apiVersion: node.eks.aws/v1alpha1',
                'kind: NodeConfig',
                'spec:',
                '  cluster:',
                '    name: dev-cluster',
                '    apiServerEndpoint: https://ABCDEF.gr7.eu-west-1.eks.amazonaws.com',
                '    certificateAuthority: LS0tLS1CRUdJTi1URVNULUNB',
                '    cidr: 172.20.0.0/16',
            ].join('\n'),
        );
    });
});

describe('renderBootstrapScript', () => {
    it('calls bootstrap.sh with the cluster connection details', () => {
        const script = renderBootstrapScript(target).split('\n');

        expect(script[1]).toBe('Content-Type: multipart/mixed; boundary="==BOUNDARY=="');
        expect(script).toContain('/etc/eks/bootstrap.sh dev-cluster \\');
        expect(script).toContain('  --b64-cluster-ca LS0tLS1CRUdJTi1URVNULUNB \\');
        expect(script).toContain('  --apiserver-endpoint https://ABCDEF.gr7.eu-west-1.eks.amazonaws.com \\');
        expect(script).toContain('  --dns-cluster-ip 172.20.0.10 \\');
        expect(script[script.length - 1]).toBe('--==BOUNDARY==--');
    });
});

describe('renderUserData', () => {
    it('base64-encodes the document for the OS family', () => {
        const decode = (value: string) => Buffer.from(value, 'base64').toString('utf-8');

        expect(decode(renderUserData(target, NodeOsFamily.AL2023))).toBe(renderNodeConfig(target));
        expect(decode(renderUserData(target, NodeOsFamily.AL2))).toBe(renderBootstrapScript(target));
    });
});
