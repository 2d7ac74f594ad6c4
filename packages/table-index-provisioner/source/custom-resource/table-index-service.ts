// Copyright Amazon.com, Inc. or its affiliates. All Rights Reserved.
// SPDX-License-Identifier: Apache-2.0

import {
  AttributeDefinition,
  DescribeTableCommand,
  DynamoDBClient,
  KeySchemaElement,
  Projection,
  UpdateTableCommand,
} from "@aws-sdk/client-dynamodb";
import { IndexDefinition } from "./lib";

export interface IndexStatusDescription {
  indexName?: string;
  indexStatus?: string;
}

export interface TableStatusDescription {
  tableStatus?: string;
  /** Absent when the table has no global secondary indexes. */
  indexes?: IndexStatusDescription[];
}

export function toAttributeDefinitions(definition: IndexDefinition): AttributeDefinition[] {
  const keys = definition.sortKey ? [definition.partitionKey, definition.sortKey] : [definition.partitionKey];
  return keys.map((key) => ({ AttributeName: key.name, AttributeType: key.type }));
}

export function toKeySchema(definition: IndexDefinition): KeySchemaElement[] {
  const keySchema: KeySchemaElement[] = [{ AttributeName: definition.partitionKey.name, KeyType: "HASH" }];
  if (definition.sortKey) {
    keySchema.push({ AttributeName: definition.sortKey.name, KeyType: "RANGE" });
  }
  return keySchema;
}

export function toProjection(definition: IndexDefinition): Projection {
  const { projectionType, nonKeyAttributes } = definition.projection;
  const projection: Projection = { ProjectionType: projectionType };
  if (projectionType === "INCLUDE" && nonKeyAttributes?.length) {
    projection.NonKeyAttributes = nonKeyAttributes;
  }
  return projection;
}

/**
 * DescribeTable and UpdateTable against one DynamoDB client.
 */
export class TableIndexService {
  constructor(private readonly dynamoDB: DynamoDBClient) {}

  /**
   * Reads the table status and the status of each of its global secondary indexes.
   * @param tableName The table to describe.
   */
  async describe(tableName: string): Promise<TableStatusDescription> {
    const response = await this.dynamoDB.send(new DescribeTableCommand({ TableName: tableName }));
    const table = response.Table;

    return {
      tableStatus: table?.TableStatus,
      indexes: table?.GlobalSecondaryIndexes?.map((index) => ({
        indexName: index.IndexName,
        indexStatus: index.IndexStatus,
      })),
    };
  }

  /**
   * Requests creation of one global secondary index. DynamoDB builds the index asynchronously.
   * @param tableName The table to update.
   * @param definition The index to add.
   */
  async createIndex(tableName: string, definition: IndexDefinition): Promise<void> {
    await this.dynamoDB.send(
      new UpdateTableCommand({
        TableName: tableName,
        AttributeDefinitions: toAttributeDefinitions(definition),
        GlobalSecondaryIndexUpdates: [
          {
            Create: {
              IndexName: definition.indexName,
              KeySchema: toKeySchema(definition),
              Projection: toProjection(definition),
              ProvisionedThroughput: {
                ReadCapacityUnits: definition.provisionedThroughput.readCapacityUnits,
                WriteCapacityUnits: definition.provisionedThroughput.writeCapacityUnits,
              },
            },
          },
        ],
      })
    );
  }
}
