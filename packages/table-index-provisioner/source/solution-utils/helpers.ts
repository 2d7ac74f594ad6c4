// Copyright Amazon.com, Inc. or its affiliates. All Rights Reserved.
// SPDX-License-Identifier: Apache-2.0

/**
 * Determines if the provided value is null, undefined or only whitespace.
 * @param str The value to check.
 * @returns Whether the value has no usable content.
 */
export function isNullOrWhiteSpace(str: string | null | undefined): boolean {
  return str === null || str === undefined || str.replace(/\s/g, "").length < 1;
}

/**
 * Returns a promise that resolves after the given number of milliseconds.
 * @param ms Milliseconds to wait.
 */
export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/**
 * Extracts a printable message from anything thrown.
 * @param error The caught value.
 * @returns The error message.
 */
export function getErrorMessage(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
}
