/**
 * @format
 * Hardened AMI Pipeline Construct
 *
 * Creates an EC2 Image Builder pipeline that applies a CIS hardening Ansible
 * playbook on top of the EKS-optimized AMI and publishes the resulting AMI id
 * to an SSM parameter.
 *
 * Architecture:
 * 1. Component: installs Ansible, fetches the playbook, runs it locally
 * 2. Recipe: the component on top of the parent EKS-optimized AMI (SSM lookup)
 * 3. Infrastructure Config: build instance, profile, SNS notifications
 * 4. Distribution: writes the new AMI id to the SSM parameter
 * 5. Pipeline: on-demand builds, optional image scanning
 *
 * Builds are on-demand. The parent image reminder Lambda reports when the
 * parent AMI changed since the last build.
 *
 * @example
 * ```typescript
 * const pipeline = new HardenedAmiPipelineConstruct(this, 'HardenedAmi', {
 *     namePrefix: 'eks-hardened-ami-development',
 *     pipelineConfig: configs.pipeline,
 * });
 * ```
 */

import { NagSuppressions } from 'cdk-nag';

import * as iam from 'aws-cdk-lib/aws-iam';
import * as imagebuilder from 'aws-cdk-lib/aws-imagebuilder';
import * as sns from 'aws-cdk-lib/aws-sns';
import * as ssm from 'aws-cdk-lib/aws-ssm';
import * as cdk from 'aws-cdk-lib/core';

import { Construct } from 'constructs';

import { AMI_PARAMETER_PLACEHOLDER } from '../../../../lambda/rollout/ami-watcher';
import { HardenedAmiPipelineConfig } from '../../../config/rollout/configurations';

// =============================================================================
// PROPS
// =============================================================================

export interface HardenedAmiPipelineProps {
    /** Environment-aware name prefix (e.g., 'eks-hardened-ami-development') */
    readonly namePrefix: string;
    readonly pipelineConfig: HardenedAmiPipelineConfig;
}

// =============================================================================
// CONSTRUCT
// =============================================================================

export class HardenedAmiPipelineConstruct extends Construct {
    /** SSM parameter storing the latest hardened AMI id */
    public readonly amiSsmParameter: ssm.StringParameter;
    public readonly pipeline: imagebuilder.CfnImagePipeline;
    /** Image Builder publishes image state notifications here */
    public readonly notificationTopic: sns.Topic;
    public readonly instanceRole: iam.Role;

    constructor(scope: Construct, id: string, props: HardenedAmiPipelineProps) {
        super(scope, id);

        const { namePrefix, pipelineConfig } = props;
        const { buildSubnetId, buildSecurityGroupIds } = pipelineConfig;

        if (buildSubnetId && !buildSecurityGroupIds?.length) {
            throw new Error('buildSecurityGroupIds are required when buildSubnetId is set');
        }

        // -----------------------------------------------------------------
        // 1. IAM Role for Image Builder instances
        // -----------------------------------------------------------------
        this.instanceRole = new iam.Role(this, 'InstanceRole', {
            roleName: `${namePrefix}-image-builder-role`,
            assumedBy: new iam.ServicePrincipal('ec2.amazonaws.com'),
            managedPolicies: [
                iam.ManagedPolicy.fromAwsManagedPolicyName('AmazonSSMManagedInstanceCore'),
                iam.ManagedPolicy.fromAwsManagedPolicyName('EC2InstanceProfileForImageBuilder'),
            ],
            description: 'IAM role for EC2 Image Builder instances (hardened EKS AMI)',
        });

        const instanceProfile = new iam.CfnInstanceProfile(this, 'InstanceProfile', {
            instanceProfileName: `${namePrefix}-image-builder-profile`,
            roles: [this.instanceRole.roleName],
        });

        // -----------------------------------------------------------------
        // 2. Notification topic
        // -----------------------------------------------------------------
        this.notificationTopic = new sns.Topic(this, 'NotificationTopic', {
            topicName: `${namePrefix}-image-builder-notifications`,
            displayName: 'Hardened AMI build notifications',
            enforceSSL: true,
        });

        // -----------------------------------------------------------------
        // 3. Hardening component
        // -----------------------------------------------------------------
        const hardeningComponent = new imagebuilder.CfnComponent(this, 'HardeningComponent', {
            name: `${namePrefix}-cis-hardening`,
            platform: 'Linux',
            version: '1.0.0',
            description: 'Applies the CIS hardening Ansible playbook',
            data: buildHardeningComponent(pipelineConfig),
        });

        // -----------------------------------------------------------------
        // 4. Recipe
        // -----------------------------------------------------------------
        const recipe = new imagebuilder.CfnImageRecipe(this, 'Recipe', {
            name: `${namePrefix}-recipe`,
            version: '1.0.0',
            parentImage: `ssm:${pipelineConfig.parentImageSsmPath}`,
            components: [{ componentArn: hardeningComponent.attrArn }],
            blockDeviceMappings: [
                {
                    deviceName: '/dev/xvda',
                    ebs: {
                        volumeSize: 30,
                        volumeType: 'gp3',
                        deleteOnTermination: true,
                        encrypted: true,
                    },
                },
            ],
        });

        // -----------------------------------------------------------------
        // 5. Infrastructure Configuration
        // -----------------------------------------------------------------
        const infraConfig = new imagebuilder.CfnInfrastructureConfiguration(this, 'InfraConfig', {
            name: `${namePrefix}-infra`,
            instanceProfileName: instanceProfile.ref,
            instanceTypes: pipelineConfig.instanceTypes,
            subnetId: buildSubnetId,
            securityGroupIds: buildSecurityGroupIds,
            snsTopicArn: this.notificationTopic.topicArn,
            terminateInstanceOnFailure: true,
            instanceMetadataOptions: { httpTokens: 'required' },
        });
        infraConfig.addDependency(instanceProfile);

        // -----------------------------------------------------------------
        // 6. SSM Parameter, placeholder until the first build distributes
        // -----------------------------------------------------------------
        this.amiSsmParameter = new ssm.StringParameter(this, 'AmiParameter', {
            parameterName: pipelineConfig.amiSsmPath,
            stringValue: AMI_PARAMETER_PLACEHOLDER,
            description: `Latest hardened EKS AMI id for ${namePrefix}`,
            tier: ssm.ParameterTier.STANDARD,
        });

        // -----------------------------------------------------------------
        // 7. Distribution, writes the AMI id to SSM
        //
        // amiDistributionConfiguration takes raw PascalCase JSON.
        // -----------------------------------------------------------------
        const distribution = new imagebuilder.CfnDistributionConfiguration(this, 'Distribution', {
            name: `${namePrefix}-dist`,
            distributions: [
                {
                    region: cdk.Stack.of(this).region,
                    amiDistributionConfiguration: {
                        Name: `${namePrefix}-{{ imagebuilder:buildDate }}`,
                        Description: `CIS-hardened EKS node AMI for ${namePrefix}`,
                        AmiTags: {
                            Purpose: 'HardenedEksNode',
                            Component: 'ImageBuilder',
                        },
                    },
                    ssmParameterConfigurations: [
                        {
                            parameterName: this.amiSsmParameter.parameterName,
                            dataType: 'aws:ec2:image',
                        },
                    ],
                },
            ],
        });

        // -----------------------------------------------------------------
        // 8. Image Pipeline (on-demand)
        // -----------------------------------------------------------------
        this.pipeline = new imagebuilder.CfnImagePipeline(this, 'Pipeline', {
            name: `${namePrefix}-pipeline`,
            imageRecipeArn: recipe.attrArn,
            infrastructureConfigurationArn: infraConfig.attrArn,
            distributionConfigurationArn: distribution.attrArn,
            status: 'ENABLED',
            imageTestsConfiguration: {
                imageTestsEnabled: true,
                timeoutMinutes: 60,
            },
            imageScanningConfiguration: {
                imageScanningEnabled: pipelineConfig.enableImageScanning,
            },
        });

        cdk.Tags.of(this).add('Component', 'HardenedAmiPipeline');

        NagSuppressions.addResourceSuppressions(
            this.instanceRole,
            [
                {
                    id: 'AwsSolutions-IAM4',
                    reason: 'Image Builder build instances require the AWS managed SSM and Image Builder policies',
                },
            ],
            true,
        );
        NagSuppressions.addResourceSuppressions(this.notificationTopic, [
            {
                id: 'AwsSolutions-SNS2',
                reason: 'Image Builder publishes through its service-linked role, which cannot use a customer KMS key without extra grants',
            },
        ]);
    }

    get pipelineArn(): string {
        return this.pipeline.attrArn;
    }
}

// =============================================================================
// COMPONENT DOCUMENT
// =============================================================================

/**
 * Image Builder component YAML. The playbook arguments are appended verbatim.
 */
export function buildHardeningComponent(config: HardenedAmiPipelineConfig): string {
    const playbookArguments = config.ansiblePlaybookArguments.trim();
    const runCommand = ['ansible-playbook', '-i', 'localhost,', '-c', 'local', config.playbookFile, playbookArguments]
        .filter(Boolean)
        .join(' ');

    return `
name: CisHardening
description: Apply the CIS hardening playbook to the EKS node image
schemaVersion: 1.0

phases:
  - name: build
    steps:
      - name: InstallAnsible
        action: ExecuteBash
        inputs:
          commands:
            - dnf install -y git python3-pip || yum install -y git python3-pip
            - python3 -m pip install --upgrade ansible-core

      - name: FetchPlaybook
        action: ExecuteBash
        inputs:
          commands:
            - rm -rf /tmp/hardening
            - git clone --depth 1 ${config.playbookRepository} /tmp/hardening

      - name: RunPlaybook
        action: ExecuteBash
        inputs:
          commands:
            - cd /tmp/hardening && ${runCommand}

      - name: Cleanup
        action: ExecuteBash
        inputs:
          commands:
            - rm -rf /tmp/hardening

  - name: validate
    steps:
      - name: VerifyKubeletPresent
        action: ExecuteBash
        inputs:
          commands:
            - test -x /usr/bin/kubelet
`;
}
