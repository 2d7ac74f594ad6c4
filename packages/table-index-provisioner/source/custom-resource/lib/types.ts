// Copyright Amazon.com, Inc. or its affiliates. All Rights Reserved.
// SPDX-License-Identifier: Apache-2.0

import { ErrorCodes } from "./enums";

export type LogLevelName = "DEBUG" | "INFO" | "WARN" | "ERROR" | "CRITICAL" | "SILENT";

export type Sleep = (ms: number) => Promise<void>;

export class CustomResourceError extends Error {
  constructor(public readonly code: ErrorCodes, message: string) {
    super(message);
    this.name = "CustomResourceError";
  }
}
