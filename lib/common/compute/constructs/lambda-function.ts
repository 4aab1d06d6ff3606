/**
 * @format
 * Lambda Function Construct
 *
 * Reusable Lambda function construct using CDK's NodejsFunction.
 * Handles TypeScript bundling via esbuild automatically.
 *
 * Features:
 * - Automatic TypeScript transpilation via NodejsFunction (esbuild)
 * - Source maps for debuggable CloudWatch stack traces
 * - CloudWatch log group with configurable retention
 * - IAM role with least privilege plus caller-supplied statements
 * - Environment variables with preserved NODE_OPTIONS
 * - X-Ray active tracing
 *
 * Log Group Strategy:
 * The log group is created BEFORE the Lambda and passed via the `logGroup` prop,
 * which tells CDK not to create a second one.
 *
 * Bundling Format:
 * CJS output. The AWS SDK v3 is provided by the runtime and left external.
 *
 * Tag strategy:
 * Only `Component: Lambda` is applied here. Organizational tags
 * (Environment, Project, Owner, ManagedBy) come from TaggingAspect at app level.
 */

import * as fs from 'fs';
import * as path from 'path';

import { NagSuppressions } from 'cdk-nag';

import * as iam from 'aws-cdk-lib/aws-iam';
import * as lambda from 'aws-cdk-lib/aws-lambda';
import { BundlingOptions, NodejsFunction, OutputFormat } from 'aws-cdk-lib/aws-lambda-nodejs';
import * as logs from 'aws-cdk-lib/aws-logs';
import * as cdk from 'aws-cdk-lib/core';

import { Construct } from 'constructs';

export interface LambdaFunctionConstructProps {
    /** Function name @default `${namePrefix}-function` */
    readonly functionName?: string;

    readonly description?: string;

    /**
     * Path to the TypeScript entry file for esbuild bundling.
     * @example path.join(__dirname, '../../lambda/rollout/index.ts')
     */
    readonly entry: string;

    readonly environment?: Record<string, string>;

    /** @default 30 seconds */
    readonly timeout?: cdk.Duration;

    /**
     * Reserved concurrent executions.
     * A value of 0 throttles ALL invocations (effectively disabling the function).
     * @default no limit
     */
    readonly reservedConcurrentExecutions?: number;

    /** Additional IAM policy statements for the execution role */
    readonly additionalPolicyStatements?: iam.PolicyStatement[];

    /** Name prefix for resources @default 'eks-hardened-ami' */
    readonly namePrefix?: string;
}

/**
 * @example
 * ```typescript
 * const fn = new LambdaFunctionConstruct(this, 'RolloutFunction', {
 *     functionName: 'eks-hardened-ami-rollout-development',
 *     entry: path.join(__dirname, '../../lambda/rollout/index.ts'),
 *     environment: { STATE_TABLE_NAME: table.tableName },
 *     timeout: Duration.minutes(15),
 * });
 * ```
 */
export class LambdaFunctionConstruct extends Construct {
    public readonly function: NodejsFunction;

    public readonly role: iam.Role;

    public readonly logGroup: logs.LogGroup;

    constructor(scope: Construct, id: string, props: LambdaFunctionConstructProps) {
        super(scope, id);

        const namePrefix = props.namePrefix ?? 'eks-hardened-ami';
        const functionName = props.functionName ?? `${namePrefix}-function`;

        // =================================================================
        // VALIDATION
        // =================================================================
        if (props.reservedConcurrentExecutions === 0) {
            cdk.Annotations.of(this).addWarning(
                'reservedConcurrentExecutions is 0, which throttles ALL invocations. ' +
                'Set to undefined for no limit.',
            );
        }

        // =================================================================
        // CLOUDWATCH LOG GROUP
        // =================================================================
        this.logGroup = new logs.LogGroup(this, 'LogGroup', {
            logGroupName: `/aws/lambda/${functionName}`,
            retention: logs.RetentionDays.ONE_MONTH,
            removalPolicy: cdk.RemovalPolicy.DESTROY,
        });

        // =================================================================
        // IAM ROLE
        // =================================================================
        this.role = new iam.Role(this, 'ExecutionRole', {
            assumedBy: new iam.ServicePrincipal('lambda.amazonaws.com'),
            description: `Execution role for ${functionName} Lambda function`,
            managedPolicies: [
                iam.ManagedPolicy.fromAwsManagedPolicyName(
                    'service-role/AWSLambdaBasicExecutionRole',
                ),
            ],
        });

        for (const statement of props.additionalPolicyStatements ?? []) {
            this.role.addToPrincipalPolicy(statement);
        }

        this.logGroup.grantWrite(this.role);

        // =================================================================
        // ENVIRONMENT VARIABLES
        //
        // Source maps are ALWAYS enabled. Caller's NODE_OPTIONS are appended.
        // =================================================================
        const callerNodeOptions = props.environment?.NODE_OPTIONS;
        const nodeOptions = ['--enable-source-maps', callerNodeOptions]
            .filter(Boolean)
            .join(' ');

        const { NODE_OPTIONS: _ignored, ...restEnvironment } = props.environment ?? {};
        const environment: Record<string, string> = {
            NODE_OPTIONS: nodeOptions,
            ...restEnvironment,
        };

        // =================================================================
        // BUNDLING
        // =================================================================
        const bundling: BundlingOptions = {
            sourceMap: true,
            sourcesContent: false,
            format: OutputFormat.CJS,
            target: 'node20',
            externalModules: ['@aws-sdk/*'],
        };

        // =================================================================
        // LAMBDA FUNCTION
        // =================================================================
        this.function = new NodejsFunction(this, 'Function', {
            functionName,
            description: props.description ?? `${namePrefix} Lambda function`,
            runtime: lambda.Runtime.NODEJS_20_X,
            handler: 'handler',
            entry: props.entry,
            depsLockFilePath: detectLockFile(),
            role: this.role,
            environment,
            timeout: props.timeout ?? cdk.Duration.seconds(30),
            memorySize: 256,
            architecture: lambda.Architecture.ARM_64,
            tracing: lambda.Tracing.ACTIVE,
            reservedConcurrentExecutions: props.reservedConcurrentExecutions,
            logGroup: this.logGroup,
            bundling,
        });

        cdk.Tags.of(this.function).add('Component', 'Lambda');

        NagSuppressions.addResourceSuppressions(
            this.role,
            [
                {
                    id: 'AwsSolutions-IAM4',
                    reason: 'AWSLambdaBasicExecutionRole is the standard Lambda logging policy',
                },
            ],
            true,
        );
    }
}

// =========================================================================
// HELPERS
// =========================================================================

/**
 * Walks up from cwd looking for package-lock.json. Falls back to the nearest
 * package.json so synth works before the first install.
 */
function detectLockFile(): string {
    let dir = process.cwd();
    let nearestManifest: string | undefined;

    while (true) {
        const lockFile = path.join(dir, 'package-lock.json');
        if (fs.existsSync(lockFile)) {
            return lockFile;
        }
        const manifest = path.join(dir, 'package.json');
        if (!nearestManifest && fs.existsSync(manifest)) {
            nearestManifest = manifest;
        }
        const parent = path.dirname(dir);
        if (parent === dir) break;
        dir = parent;
    }

    return nearestManifest ?? path.join(process.cwd(), 'package.json');
}
