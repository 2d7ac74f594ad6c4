// Copyright Amazon.com, Inc. or its affiliates. All Rights Reserved.
// SPDX-License-Identifier: Apache-2.0

import { Logger } from "@aws-lambda-powertools/logger";
import { getErrorMessage, sleep as defaultSleep } from "../solution-utils/helpers";
import { ReadinessReport, ResourceStatus, Sleep } from "./lib";
import { computeBackoffWait } from "./retry-policy";
import { TableIndexService, TableStatusDescription } from "./table-index-service";

export interface ReadinessPollerOptions {
  /** Backoff base and cap, in seconds. Default: 15. */
  backoffBase?: number;
  sleep?: Sleep;
}

type StatusCheck = (description: TableStatusDescription) => boolean;

/**
 * DynamoDB rejects a table update while the table or one of its indexes is still changing,
 * so every update waits here first.
 */
export class ReadinessPoller {
  private readonly backoffBase: number;
  private readonly sleep: Sleep;

  constructor(
    private readonly tableIndexService: TableIndexService,
    private readonly logger: Logger,
    options: ReadinessPollerOptions = {}
  ) {
    this.backoffBase = options.backoffBase ?? 15;
    this.sleep = options.sleep ?? defaultSleep;
  }

  /**
   * Blocks until the table is ACTIVE, then until all of its global secondary indexes are ACTIVE.
   * @param tableName The table to watch.
   * @returns How many polls each phase took.
   */
  async waitUntilReady(tableName: string): Promise<ReadinessReport> {
    const tablePolls = await this.pollUntil(tableName, "Table", isTableActive);
    this.logger.debug(`Table [${tableName}] is active`, { tableName, polls: tablePolls });

    const indexPolls = await this.pollUntil(tableName, "Indexes", areIndexesActive);
    this.logger.debug(`Table [${tableName}] GSIs are active`, { tableName, polls: indexPolls });

    return { tablePolls, indexPolls };
  }

  private async pollUntil(tableName: string, subject: string, check: StatusCheck): Promise<number> {
    let retry = 0;
    let ready = false;

    while (!ready) {
      const waitSeconds = computeBackoffWait(retry, this.backoffBase);
      this.logger.debug(`${subject} of [${tableName}] not active, waiting [${waitSeconds}] seconds to poll again`, {
        tableName,
        waitSeconds,
      });
      await this.sleep(waitSeconds * 1000);
      ready = await this.isReady(tableName, subject, check);
      retry++;
    }

    return retry;
  }

  private async isReady(tableName: string, subject: string, check: StatusCheck): Promise<boolean> {
    try {
      return check(await this.tableIndexService.describe(tableName));
    } catch (error) {
      // Fail open: an unreadable status counts as active.
      this.logger.warn(`Failed to read status for ${subject} of [${tableName}], treating as active`, {
        tableName,
        error: getErrorMessage(error),
      });
      return true;
    }
  }
}

/**
 * A missing status counts as active.
 */
export function isTableActive(description: TableStatusDescription): boolean {
  if (description.tableStatus === undefined) {
    return true;
  }
  return description.tableStatus === ResourceStatus.ACTIVE;
}

/**
 * True when the table has no indexes, or when every index is ACTIVE. An index without a status counts as active.
 */
export function areIndexesActive(description: TableStatusDescription): boolean {
  if (!description.indexes) {
    return true;
  }
  if (description.indexes.some((index) => index.indexStatus === undefined)) {
    return true;
  }
  return description.indexes.every((index) => index.indexStatus === ResourceStatus.ACTIVE);
}
