// Copyright Amazon.com, Inc. or its affiliates. All Rights Reserved.
// SPDX-License-Identifier: Apache-2.0

import { DynamoDBClient } from "@aws-sdk/client-dynamodb";
import { getErrorMessage } from "../solution-utils/helpers";
import { CompletionNotifier } from "./completion-notifier";
import { loadConfig, logLevelFromEnv, ProvisionerConfig } from "./config";
import { createIndexProvisioner, respond } from "./index-provisioner";
import { CompletionStatus, CustomResourceRequest, CustomResourceRequestTypes, LambdaContext, StatusTypes } from "./lib";
import { createLogger } from "./logger";

/**
 * Custom resource Lambda handler. Adds the configured GSIs to the table and reports to CloudFormation.
 * @param event The custom resource request.
 * @param context The Lambda context.
 * @returns The status that was reported.
 */
export async function handler(event: CustomResourceRequest, context: LambdaContext): Promise<CompletionStatus> {
  const logger = createLogger(logLevelFromEnv(process.env));
  logger.appendKeys({ requestId: event.RequestId, logicalResourceId: event.LogicalResourceId });
  logger.info(`Received event: ${event.RequestType}`);
  logger.debug("Resource properties", { resourceProperties: event.ResourceProperties });

  // Delete is answered before configuration loads.
  if (event.RequestType === CustomResourceRequestTypes.DELETE) {
    logger.info("Delete request, indexes are retained");
    return respond(new CompletionNotifier(logger), logger, event, context, StatusTypes.SUCCESS);
  }

  let config: ProvisionerConfig;
  try {
    config = loadConfig(process.env);
  } catch (error) {
    logger.error("Environment validation failed", { error: getErrorMessage(error) });
    return respond(new CompletionNotifier(logger), logger, event, context, StatusTypes.FAILED, getErrorMessage(error));
  }

  const dynamoDB = new DynamoDBClient({});
  try {
    return await createIndexProvisioner(config, dynamoDB, logger).run(event, context);
  } finally {
    dynamoDB.destroy();
  }
}
