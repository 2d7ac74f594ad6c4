// Copyright Amazon.com, Inc. or its affiliates. All Rights Reserved.
// SPDX-License-Identifier: Apache-2.0

import { Logger } from "@aws-lambda-powertools/logger";
import { CustomResourceRequest, CustomResourceRequestTypes, LambdaContext } from "../lib";

// Mock AWS SDK v3 DynamoDB client
export const mockDynamoDBCommands = {
  describeTable: jest.fn(),
  updateTable: jest.fn(),
};
export const mockDynamoDBClients: Array<{ send: jest.Mock; destroy: jest.Mock }> = [];
jest.mock("@aws-sdk/client-dynamodb", () => {
  const actual = jest.requireActual<typeof import("@aws-sdk/client-dynamodb")>("@aws-sdk/client-dynamodb");
  return {
    DynamoDBClient: jest.fn(() => {
      const client = {
        send: jest.fn((command: unknown) => {
          if (command instanceof actual.DescribeTableCommand) {
            return mockDynamoDBCommands.describeTable(command.input);
          } else if (command instanceof actual.UpdateTableCommand) {
            return mockDynamoDBCommands.updateTable(command.input);
          }
          throw new Error(`Unimplemented DynamoDB command: ${String(command)}`);
        }),
        destroy: jest.fn(),
      };
      mockDynamoDBClients.push(client);
      return client;
    }),
    DescribeTableCommand: actual.DescribeTableCommand,
    UpdateTableCommand: actual.UpdateTableCommand,
  };
});

// Mock axios
export const mockAxios = {
  put: jest.fn(),
};
jest.mock("axios", () => ({
  ...mockAxios,
}));

export function resetMocks(): void {
  Object.values(mockDynamoDBCommands).forEach((mock) => mock.mockReset());
  mockDynamoDBClients.length = 0;
  mockAxios.put.mockReset();
  mockAxios.put.mockResolvedValue({ status: 200 });
}

export function activeTable(...indexNames: string[]) {
  return {
    Table: {
      TableName: "test-table",
      TableStatus: "ACTIVE",
      ...(indexNames.length > 0
        ? { GlobalSecondaryIndexes: indexNames.map((IndexName) => ({ IndexName, IndexStatus: "ACTIVE" })) }
        : {}),
    },
  };
}

export function silentLogger(): Logger {
  return new Logger({ serviceName: "table-index-provisioner-test", logLevel: "SILENT" });
}

export function contextWithRemainingTime(remainingMs: number): LambdaContext {
  return {
    logStreamName: "mock-stream",
    getRemainingTimeInMillis: () => remainingMs,
  };
}

// Lambda context
export const mockContext: LambdaContext = contextWithRemainingTime(900000);

// Custom resource event
export const mockEvent: CustomResourceRequest = {
  RequestType: CustomResourceRequestTypes.CREATE,
  ResponseURL: "https://cfn-response.test/mock-response",
  StackId: "mock-stack-id",
  ServiceToken: "mock-service-token",
  RequestId: "mock-request-id",
  LogicalResourceId: "mock-logical-resource-id",
  ResourceType: "Custom::TableIndexes",
  ResourceProperties: {
    ServiceToken: "mock-service-token",
  },
};
