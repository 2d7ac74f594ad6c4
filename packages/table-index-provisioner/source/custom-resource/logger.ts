// Copyright Amazon.com, Inc. or its affiliates. All Rights Reserved.
// SPDX-License-Identifier: Apache-2.0

import { Logger } from "@aws-lambda-powertools/logger";
import { LogLevelName } from "./lib";

export const SERVICE_NAME = "table-index-provisioner";

/**
 * Creates the structured logger used for one invocation.
 * @param logLevel Minimum level to emit.
 */
export function createLogger(logLevel: LogLevelName): Logger {
  return new Logger({ serviceName: SERVICE_NAME, logLevel });
}
