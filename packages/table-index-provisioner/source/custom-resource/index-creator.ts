// Copyright Amazon.com, Inc. or its affiliates. All Rights Reserved.
// SPDX-License-Identifier: Apache-2.0

import { Logger } from "@aws-lambda-powertools/logger";
import { getErrorMessage } from "../solution-utils/helpers";
import {
  CustomResourceError,
  ErrorCodes,
  IndexCreationOutcome,
  IndexCreationResult,
  IndexDefinition,
  LambdaContext,
  Sleep,
} from "./lib";
import { RetryPolicy, withRetry } from "./retry-policy";
import { TableIndexService } from "./table-index-service";

/** Remaining invocation time below which no further attempt is started. */
export const SAFETY_MARGIN_MS = 10000;

export interface IndexCreatorOptions {
  /** Default: 5. */
  maxAttempts?: number;
  /** Default: 30 seconds. */
  retryDelayMs?: number;
  sleep?: Sleep;
}

/**
 * DynamoDB answers a second creation of the same index with "...an index which already exists".
 */
export function isAlreadyExistsError(error: unknown): boolean {
  return getErrorMessage(error).includes("already exists");
}

export class IndexCreator {
  private readonly policy: RetryPolicy;
  private readonly sleep?: Sleep;

  constructor(
    private readonly tableIndexService: TableIndexService,
    private readonly logger: Logger,
    options: IndexCreatorOptions = {}
  ) {
    this.policy = {
      maxAttempts: options.maxAttempts ?? 5,
      delayMs: options.retryDelayMs ?? 30000,
      shortCircuit: isAlreadyExistsError,
    };
    this.sleep = options.sleep;
  }

  /**
   * Adds one global secondary index to the table, retrying failed requests.
   * An index that already exists counts as created. Running out of attempts is reported in the result, not thrown.
   * @param tableName The table to update.
   * @param definition The index to add.
   * @param context Invocation context, checked for remaining time before every attempt.
   * @returns The outcome and the number of attempts made.
   * @throws {CustomResourceError} `TimeoutImminent` when less than {@link SAFETY_MARGIN_MS} remains before an attempt.
   */
  async create(tableName: string, definition: IndexDefinition, context: LambdaContext): Promise<IndexCreationResult> {
    const { indexName } = definition;

    const outcome = await withRetry(
      async (attempt) => {
        this.logger.info(`Adding GSI ${indexName} to ${tableName}`, { tableName, indexName, attempt });
        await this.tableIndexService.createIndex(tableName, definition);
      },
      this.policy,
      {
        beforeAttempt: () => {
          if (context.getRemainingTimeInMillis() <= SAFETY_MARGIN_MS) {
            throw new CustomResourceError(ErrorCodes.TIMEOUT_IMMINENT, "Function was about to timeout");
          }
        },
        onRetry: (attempt, error) => {
          this.logger.debug(`Retrying creation of GSI ${indexName} after waiting [${this.policy.delayMs / 1000}] seconds.`, {
            indexName,
            retriesRemaining: this.policy.maxAttempts - attempt,
            error: getErrorMessage(error),
          });
        },
        sleep: this.sleep,
      }
    );

    switch (outcome.status) {
      case "SUCCEEDED":
        this.logger.info(`GSI ${indexName} added!`, { tableName, indexName, attempts: outcome.attempts });
        return { indexName, outcome: IndexCreationOutcome.CREATED, attempts: outcome.attempts };
      case "SHORT_CIRCUITED":
        this.logger.info(`GSI ${indexName} already created`, { tableName, indexName });
        return { indexName, outcome: IndexCreationOutcome.ALREADY_EXISTS, attempts: outcome.attempts };
      case "EXHAUSTED": {
        const error = getErrorMessage(outcome.error);
        this.logger.error(`Creating GSI ${indexName} failed after ${outcome.attempts} attempts`, {
          tableName,
          indexName,
          error,
        });
        return { indexName, outcome: IndexCreationOutcome.FAILED, attempts: outcome.attempts, error };
      }
    }
  }
}
