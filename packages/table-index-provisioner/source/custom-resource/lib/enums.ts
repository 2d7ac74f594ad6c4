// Copyright Amazon.com, Inc. or its affiliates. All Rights Reserved.
// SPDX-License-Identifier: Apache-2.0

export enum CustomResourceRequestTypes {
  CREATE = "Create",
  UPDATE = "Update",
  DELETE = "Delete",
}

export enum StatusTypes {
  SUCCESS = "SUCCESS",
  FAILED = "FAILED",
}

export enum ErrorCodes {
  CONFIGURATION_ERROR = "ConfigurationError",
  TIMEOUT_IMMINENT = "TimeoutImminent",
  CUSTOM_RESOURCE_ERROR = "CustomResourceError",
}

export enum ResourceStatus {
  ACTIVE = "ACTIVE",
}

export enum IndexCreationOutcome {
  CREATED = "CREATED",
  ALREADY_EXISTS = "ALREADY_EXISTS",
  FAILED = "FAILED",
}
