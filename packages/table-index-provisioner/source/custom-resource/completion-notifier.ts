// Copyright Amazon.com, Inc. or its affiliates. All Rights Reserved.
// SPDX-License-Identifier: Apache-2.0

import axios, { AxiosRequestConfig } from "axios";
import { Logger } from "@aws-lambda-powertools/logger";
import { CompletionPayload, CustomResourceRequest, LambdaContext, StatusTypes } from "./lib";

export function defaultReason(logStreamName: string): string {
  return `See the details in CloudWatch Log Stream: ${logStreamName}`;
}

/**
 * Builds the body CloudFormation expects at the pre-signed response URL.
 * @param event The custom resource request being answered.
 * @param context Invocation context.
 * @param status Outcome to report.
 * @param reason Human-readable reason; defaults to a pointer at the log stream.
 */
export function buildCompletionPayload(
  event: CustomResourceRequest,
  context: LambdaContext,
  status: StatusTypes,
  reason?: string
): CompletionPayload {
  return {
    Status: status,
    Reason: reason ?? defaultReason(context.logStreamName),
    PhysicalResourceId: event.PhysicalResourceId ?? context.logStreamName,
    StackId: event.StackId,
    RequestId: event.RequestId,
    LogicalResourceId: event.LogicalResourceId,
  };
}

export class CompletionNotifier {
  constructor(private readonly logger: Logger) {}

  /**
   * Sends the status response to CloudFormation. The URL is single use and the call is not retried.
   * @throws whatever the HTTP client throws.
   */
  async send(
    event: CustomResourceRequest,
    context: LambdaContext,
    status: StatusTypes,
    reason?: string
  ): Promise<CompletionPayload> {
    const payload = buildCompletionPayload(event, context, status, reason);
    const responseBody = JSON.stringify(payload);
    const config: AxiosRequestConfig = {
      headers: {
        "content-type": "",
        "content-length": Buffer.byteLength(responseBody),
      },
    };

    this.logger.info(`Response: ${responseBody}`);
    this.logger.info("Sending status response...");
    await axios.put(event.ResponseURL, responseBody, config);
    this.logger.info("Status response sent!");

    return payload;
  }
}
