// Copyright Amazon.com, Inc. or its affiliates. All Rights Reserved.
// SPDX-License-Identifier: Apache-2.0

import type { Context } from "aws-lambda";
import { CustomResourceRequestTypes, IndexCreationOutcome, StatusTypes } from "./enums";

export interface CustomResourceRequestPropertiesBase {
  ServiceToken?: string;
  [key: string]: unknown;
}

export interface CustomResourceRequest {
  RequestType: CustomResourceRequestTypes;
  PhysicalResourceId?: string;
  StackId: string;
  ServiceToken: string;
  RequestId: string;
  LogicalResourceId: string;
  ResponseURL: string;
  ResourceType: string;
  ResourceProperties: CustomResourceRequestPropertiesBase;
}

export type LambdaContext = Pick<Context, "logStreamName" | "getRemainingTimeInMillis">;

export type KeyAttributeType = "S" | "N" | "B";
export type ProjectionType = "ALL" | "KEYS_ONLY" | "INCLUDE";

export interface KeyAttribute {
  name: string;
  type: KeyAttributeType;
}

export interface IndexDefinition {
  indexName: string;
  partitionKey: KeyAttribute;
  sortKey?: KeyAttribute;
  projection: {
    projectionType: ProjectionType;
    nonKeyAttributes?: string[];
  };
  provisionedThroughput: {
    readCapacityUnits: number;
    writeCapacityUnits: number;
  };
}

export interface IndexCreationResult {
  indexName: string;
  outcome: IndexCreationOutcome;
  attempts: number;
  error?: string;
}

export interface ReadinessReport {
  tablePolls: number;
  indexPolls: number;
}

export interface CompletionPayload {
  Status: StatusTypes;
  Reason: string;
  PhysicalResourceId: string;
  StackId: string;
  RequestId: string;
  LogicalResourceId: string;
}

export interface CompletionStatus {
  Status: StatusTypes;
  Reason: string;
  Indexes: IndexCreationResult[];
}
