// Copyright Amazon.com, Inc. or its affiliates. All Rights Reserved.
// SPDX-License-Identifier: Apache-2.0

import { DynamoDBClient } from "@aws-sdk/client-dynamodb";
import { Logger } from "@aws-lambda-powertools/logger";
import { getErrorMessage } from "../solution-utils/helpers";
import { CompletionNotifier } from "./completion-notifier";
import { buildIndexDefinitions, ProvisionerConfig } from "./config";
import { IndexCreator } from "./index-creator";
import {
  CompletionStatus,
  CustomResourceError,
  CustomResourceRequest,
  CustomResourceRequestTypes,
  ErrorCodes,
  IndexCreationOutcome,
  IndexCreationResult,
  IndexDefinition,
  LambdaContext,
  Sleep,
  StatusTypes,
} from "./lib";
import { ReadinessPoller } from "./readiness-poller";
import { TableIndexService } from "./table-index-service";

/**
 * Reports `status` to CloudFormation. A failed SUCCESS report is followed by one FAILED report;
 * a failed FAILED report is logged and dropped.
 */
export async function respond(
  notifier: CompletionNotifier,
  logger: Logger,
  event: CustomResourceRequest,
  context: LambdaContext,
  status: StatusTypes,
  reason?: string,
  indexes: IndexCreationResult[] = []
): Promise<CompletionStatus> {
  try {
    const payload = await notifier.send(event, context, status, reason);
    return { Status: payload.Status, Reason: payload.Reason, Indexes: indexes };
  } catch (error) {
    const message = getErrorMessage(error);
    logger.error(`Failed to send the ${status} response`, { error: message });
    if (status === StatusTypes.FAILED) {
      return { Status: StatusTypes.FAILED, Reason: message, Indexes: indexes };
    }
  }

  const fallbackReason = `Failed to send the ${status} response`;
  try {
    const payload = await notifier.send(event, context, StatusTypes.FAILED, fallbackReason);
    return { Status: payload.Status, Reason: payload.Reason, Indexes: indexes };
  } catch (error) {
    const message = getErrorMessage(error);
    logger.error(`Failed to send the ${StatusTypes.FAILED} response`, { error: message });
    return { Status: StatusTypes.FAILED, Reason: message, Indexes: indexes };
  }
}

/**
 * Adds the configured indexes one at a time, each after the table has settled, then reports back.
 */
export class IndexProvisioner {
  constructor(
    private readonly tableName: string,
    private readonly definitions: IndexDefinition[],
    private readonly poller: ReadinessPoller,
    private readonly creator: IndexCreator,
    private readonly notifier: CompletionNotifier,
    private readonly logger: Logger
  ) {}

  async run(event: CustomResourceRequest, context: LambdaContext): Promise<CompletionStatus> {
    if (event.RequestType === CustomResourceRequestTypes.DELETE) {
      this.logger.info(`Delete request for ${this.tableName}, indexes are retained`);
      return respond(this.notifier, this.logger, event, context, StatusTypes.SUCCESS);
    }

    const indexes: IndexCreationResult[] = [];
    try {
      for (const definition of this.definitions) {
        await this.poller.waitUntilReady(this.tableName);
        this.logger.info(`Creating GSI ${definition.indexName} on ${this.tableName}`);
        const result = await this.creator.create(this.tableName, definition, context);
        indexes.push(result);
        if (result.outcome === IndexCreationOutcome.FAILED) {
          // The run still reports SUCCESS; the failure shows in the logs and in Indexes.
          this.logger.error(`GSI ${definition.indexName} was not created, continuing`, { ...result });
        }
      }
      await this.poller.waitUntilReady(this.tableName);
    } catch (error) {
      const message = getErrorMessage(error);
      const code = error instanceof CustomResourceError ? error.code : ErrorCodes.CUSTOM_RESOURCE_ERROR;
      this.logger.error(`Error occurred while adding GSIs to ${this.tableName}`, { code, error: message });
      return respond(this.notifier, this.logger, event, context, StatusTypes.FAILED, message, indexes);
    }

    return respond(this.notifier, this.logger, event, context, StatusTypes.SUCCESS, undefined, indexes);
  }
}

/**
 * Wires one provisioner around the given client. Everything built here lives for a single invocation.
 * @param config The provisioner configuration.
 * @param dynamoDB The client used for DescribeTable and UpdateTable.
 * @param logger The invocation logger.
 * @param sleep Overrides the wait used by polling and retries.
 */
export function createIndexProvisioner(
  config: ProvisionerConfig,
  dynamoDB: DynamoDBClient,
  logger: Logger,
  sleep?: Sleep
): IndexProvisioner {
  const tableIndexService = new TableIndexService(dynamoDB);
  const poller = new ReadinessPoller(tableIndexService, logger, { backoffBase: config.pollBackoffBase, sleep });
  const creator = new IndexCreator(tableIndexService, logger, {
    maxAttempts: config.createMaxAttempts,
    retryDelayMs: config.createRetryDelayMs,
    sleep,
  });

  return new IndexProvisioner(
    config.tableName,
    buildIndexDefinitions(config),
    poller,
    creator,
    new CompletionNotifier(logger),
    logger
  );
}
