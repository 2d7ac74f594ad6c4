// Copyright Amazon.com, Inc. or its affiliates. All Rights Reserved.
// SPDX-License-Identifier: Apache-2.0

import {
  activeTable,
  mockAxios,
  mockContext,
  mockDynamoDBClients,
  mockDynamoDBCommands,
  mockEvent,
  resetMocks,
} from "./mock";
import { sleep } from "../../solution-utils/helpers";
import { handler } from "../index";
import { createLogger } from "../logger";
import { CustomResourceRequestTypes, IndexCreationOutcome, StatusTypes } from "../lib";

jest.mock("../../solution-utils/helpers", () => ({
  ...jest.requireActual<typeof import("../../solution-utils/helpers")>("../../solution-utils/helpers"),
  sleep: jest.fn(() => Promise.resolve()),
}));

jest.mock("../logger", () => {
  const actual = jest.requireActual<typeof import("../logger")>("../logger");
  return { ...actual, createLogger: jest.fn(actual.createLogger) };
});

describe("handler", () => {
  const OLD_ENV = process.env;

  beforeEach(() => {
    resetMocks();
    jest.clearAllMocks();
    process.env = {
      ...OLD_ENV,
      TABLE_NAME: "orders",
      GSI_1: "orders-by-key",
      GSI_2: "orders-by-key-and-sort",
      LOG_LEVEL: "SILENT",
    };
  });

  afterAll(() => {
    process.env = OLD_ENV;
  });

  it("Should add both indexes and report SUCCESS on Create", async () => {
    mockDynamoDBCommands.describeTable.mockResolvedValue(activeTable());
    mockDynamoDBCommands.updateTable.mockResolvedValue({});

    const result = await handler(mockEvent, mockContext);

    expect(result).toEqual({
      Status: StatusTypes.SUCCESS,
      Reason: "See the details in CloudWatch Log Stream: mock-stream",
      Indexes: [
        { indexName: "orders-by-key", outcome: IndexCreationOutcome.CREATED, attempts: 1 },
        { indexName: "orders-by-key-and-sort", outcome: IndexCreationOutcome.CREATED, attempts: 1 },
      ],
    });
    expect(mockDynamoDBCommands.describeTable).toHaveBeenCalledWith({ TableName: "orders" });
    expect(sleep).toHaveBeenCalledTimes(6);
    expect(mockAxios.put).toHaveBeenCalledTimes(1);
  });

  it("Should build a fresh client for every invocation and release it", async () => {
    mockDynamoDBCommands.describeTable.mockResolvedValue(activeTable());
    mockDynamoDBCommands.updateTable.mockResolvedValue({});

    await handler(mockEvent, mockContext);
    await handler(mockEvent, mockContext);

    expect(mockDynamoDBClients).toHaveLength(2);
    for (const client of mockDynamoDBClients) {
      expect(client.destroy).toHaveBeenCalledTimes(1);
    }
  });

  it("Should report FAILED when required configuration is missing", async () => {
    delete process.env.GSI_2;

    const result = await handler(mockEvent, mockContext);

    expect(result).toEqual({
      Status: StatusTypes.FAILED,
      Reason: "Missing required environment variables: GSI_2",
      Indexes: [],
    });
    expect(mockDynamoDBClients).toHaveLength(0);
    expect(JSON.parse(mockAxios.put.mock.calls[0][1])).toMatchObject({
      Status: "FAILED",
      Reason: "Missing required environment variables: GSI_2",
    });
  });

  it("Should answer Delete with SUCCESS and leave the table alone", async () => {
    const result = await handler(
      { ...mockEvent, RequestType: CustomResourceRequestTypes.DELETE, PhysicalResourceId: "mock-physical-id" },
      mockContext
    );

    expect(result.Status).toEqual(StatusTypes.SUCCESS);
    expect(mockDynamoDBCommands.describeTable).not.toHaveBeenCalled();
    expect(mockDynamoDBCommands.updateTable).not.toHaveBeenCalled();
  });

  it("Should answer Delete with SUCCESS even when configuration is invalid", async () => {
    delete process.env.GSI_2;

    const result = await handler(
      { ...mockEvent, RequestType: CustomResourceRequestTypes.DELETE, PhysicalResourceId: "mock-physical-id" },
      mockContext
    );

    expect(result).toEqual({
      Status: StatusTypes.SUCCESS,
      Reason: "See the details in CloudWatch Log Stream: mock-stream",
      Indexes: [],
    });
    expect(mockDynamoDBClients).toHaveLength(0);
    expect(mockDynamoDBCommands.describeTable).not.toHaveBeenCalled();
    expect(JSON.parse(mockAxios.put.mock.calls[0][1])).toMatchObject({
      Status: "SUCCESS",
      PhysicalResourceId: "mock-physical-id",
    });
  });

  it("Should take the level from logging_level when LOG_LEVEL is blank", async () => {
    process.env.LOG_LEVEL = "";
    process.env.logging_level = "ERROR";

    await handler({ ...mockEvent, RequestType: CustomResourceRequestTypes.DELETE }, mockContext);

    expect(createLogger).toHaveBeenCalledWith("ERROR");
  });
});
