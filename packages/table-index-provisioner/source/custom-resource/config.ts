// Copyright Amazon.com, Inc. or its affiliates. All Rights Reserved.
// SPDX-License-Identifier: Apache-2.0

import { isNullOrWhiteSpace } from "../solution-utils/helpers";
import { CustomResourceError, ErrorCodes, IndexDefinition, LogLevelName } from "./lib";

export interface ProvisionerEnv {
  TABLE_NAME: string;
  GSI_1: string;
  GSI_2: string;
}

export interface ProvisionerConfig {
  tableName: string;
  indexNames: [string, string];
  readCapacityUnits: number;
  writeCapacityUnits: number;
  createMaxAttempts: number;
  createRetryDelayMs: number;
  pollBackoffBase: number;
}

export interface ValidateEnvResult<T> {
  success: boolean;
  env?: T;
  error?: string;
}

const LOG_LEVEL_ALIASES: Record<string, LogLevelName> = {
  DEBUG: "DEBUG",
  INFO: "INFO",
  WARN: "WARN",
  WARNING: "WARN",
  ERROR: "ERROR",
  CRITICAL: "CRITICAL",
  SILENT: "SILENT",
};

/**
 * Checks that every required variable is present and not blank.
 * @param env The environment to read.
 * @returns The validated subset, or the list of missing names in `error`.
 */
export function validateEnv(env: Record<string, string | undefined>): ValidateEnvResult<ProvisionerEnv> {
  const { TABLE_NAME, GSI_1, GSI_2 } = env;
  const missingFields = Object.entries({ TABLE_NAME, GSI_1, GSI_2 })
    .filter(([, value]) => isNullOrWhiteSpace(value))
    .map(([field]) => field);

  if (missingFields.length > 0 || TABLE_NAME === undefined || GSI_1 === undefined || GSI_2 === undefined) {
    return {
      success: false,
      error: `Missing required environment variables: ${missingFields.join(", ")}`,
    };
  }

  return { success: true, env: { TABLE_NAME, GSI_1, GSI_2 } };
}

/**
 * Parses an integer environment variable, falling back to the default when unset or blank.
 * @throws {CustomResourceError} `ConfigurationError` when the value is not a whole number.
 */
export function parseIntEnv(name: string, value: string | undefined, defaultValue: number): number {
  if (isNullOrWhiteSpace(value)) return defaultValue;
  const parsed = Number(String(value).trim());
  if (!Number.isInteger(parsed)) {
    throw new CustomResourceError(ErrorCodes.CONFIGURATION_ERROR, `${name} must be an integer, got '${value}'`);
  }
  return parsed;
}

/**
 * Maps a level name, WARNING included, onto a logger level. Unknown values fall back to INFO.
 */
export function resolveLogLevel(value: string | undefined): LogLevelName {
  if (isNullOrWhiteSpace(value)) {
    return "INFO";
  }
  return LOG_LEVEL_ALIASES[String(value).trim().toUpperCase()] ?? "INFO";
}

/**
 * Reads the log level from `LOG_LEVEL`, or from `logging_level` when `LOG_LEVEL` is unset or blank.
 */
export function logLevelFromEnv(env: Record<string, string | undefined>): LogLevelName {
  const { LOG_LEVEL, logging_level } = env;
  return resolveLogLevel(isNullOrWhiteSpace(LOG_LEVEL) ? logging_level : LOG_LEVEL);
}

function requirePositive(name: string, value: number): number {
  if (value < 1) {
    throw new CustomResourceError(ErrorCodes.CONFIGURATION_ERROR, `${name} must be a positive integer, got ${value}`);
  }
  return value;
}

function positiveIntEnv(env: Record<string, string | undefined>, name: string, defaultValue: number): number {
  return requirePositive(name, parseIntEnv(name, env[name], defaultValue));
}

/**
 * Builds the provisioner configuration from environment variables.
 * @param env Usually `process.env`.
 * @returns The configuration.
 */
export function loadConfig(env: Record<string, string | undefined>): ProvisionerConfig {
  const validation = validateEnv(env);
  if (!validation.success || !validation.env) {
    throw new CustomResourceError(
      ErrorCodes.CONFIGURATION_ERROR,
      validation.error ?? "Environment validation failed"
    );
  }

  const { TABLE_NAME, GSI_1, GSI_2 } = validation.env;
  if (GSI_1 === GSI_2) {
    throw new CustomResourceError(ErrorCodes.CONFIGURATION_ERROR, `GSI_1 and GSI_2 must differ, both are '${GSI_1}'`);
  }

  return {
    tableName: TABLE_NAME,
    indexNames: [GSI_1, GSI_2],
    readCapacityUnits: positiveIntEnv(env, "GSI_READ_CAPACITY", 5),
    writeCapacityUnits: positiveIntEnv(env, "GSI_WRITE_CAPACITY", 5),
    createMaxAttempts: positiveIntEnv(env, "INDEX_CREATE_MAX_ATTEMPTS", 5),
    createRetryDelayMs: positiveIntEnv(env, "INDEX_CREATE_RETRY_DELAY_SECONDS", 30) * 1000,
    pollBackoffBase: positiveIntEnv(env, "POLL_BACKOFF_BASE", 15),
  };
}

/**
 * The two index definitions added to the table. Both key on `gsikey` and project `primary`;
 * the second adds `gsisortkey` as sort key.
 * @param config The provisioner configuration.
 */
export function buildIndexDefinitions(config: ProvisionerConfig): [IndexDefinition, IndexDefinition] {
  const [firstIndexName, secondIndexName] = config.indexNames;
  const shared: Omit<IndexDefinition, "indexName" | "sortKey"> = {
    partitionKey: { name: "gsikey", type: "N" },
    projection: { projectionType: "INCLUDE", nonKeyAttributes: ["primary"] },
    provisionedThroughput: {
      readCapacityUnits: config.readCapacityUnits,
      writeCapacityUnits: config.writeCapacityUnits,
    },
  };

  return [
    { indexName: firstIndexName, ...shared },
    { indexName: secondIndexName, ...shared, sortKey: { name: "gsisortkey", type: "N" } },
  ];
}
