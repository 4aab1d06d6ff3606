/** @format */

import * as cdk from "aws-cdk-lib/core";

import * as dynamodb from "aws-cdk-lib/aws-dynamodb";

import { Construct } from "constructs";

/**
 * Configuration for DynamoDB table attribute definitions
 */
export interface DynamoDbAttributeConfig {
  name: string;
  type: dynamodb.AttributeType;
}

/**
 * Properties for DynamoDbTableConstruct
 */
export interface DynamoDbTableConstructProps {
  /**
   * Environment name (e.g., 'development', 'production')
   * Used for resource naming and production defaults
   */
  envName: string;

  /**
   * Project name used for resource naming
   */
  projectName: string;

  /**
   * Table name suffix
   * Final table name will be: `${projectName}-${tableName}-${envName}`
   * @example 'rollout-state'
   */
  tableName: string;

  partitionKey: DynamoDbAttributeConfig;

  sortKey?: DynamoDbAttributeConfig;
}

/**
 * On-demand DynamoDB table with AWS-managed encryption. Production tables
 * get point-in-time recovery and deletion protection and are retained.
 */
export class DynamoDbTableConstruct extends Construct {
  public readonly table: dynamodb.Table;

  constructor(
    scope: Construct,
    id: string,
    props: DynamoDbTableConstructProps
  ) {
    super(scope, id);

    if (!/^[a-zA-Z0-9_.-]+$/.test(props.tableName)) {
      throw new Error(
        `Invalid table name suffix '${props.tableName}'. ` +
          `Use letters, digits, '_', '-' or '.'.`
      );
    }

    const isProduction = props.envName.toLowerCase() === "production";
    const fullTableName = `${props.projectName}-${props.tableName}-${props.envName}`;


    // ========================================================================
    // CREATE DYNAMODB TABLE
    // ========================================================================

    this.table = new dynamodb.Table(this, "Table", {
      tableName: fullTableName,
      partitionKey: {
        name: props.partitionKey.name,
        type: props.partitionKey.type,
      },
      sortKey: props.sortKey
        ? { name: props.sortKey.name, type: props.sortKey.type }
        : undefined,
      billingMode: dynamodb.BillingMode.PAY_PER_REQUEST,
      encryption: dynamodb.TableEncryption.AWS_MANAGED,
      pointInTimeRecoverySpecification: {
        pointInTimeRecoveryEnabled: isProduction,
      },
      removalPolicy: isProduction
        ? cdk.RemovalPolicy.RETAIN
        : cdk.RemovalPolicy.DESTROY,
      deletionProtection: isProduction,
    });

    cdk.Tags.of(this.table).add("TableName", props.tableName);
  }
}
