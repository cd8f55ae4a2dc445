// This file is part of LensKit.
// Copyright (C) 2018-2023 Boise State University
// Copyright (C) 2023-2025 Drexel University
// Licensed under the MIT license, see LICENSE.md for details.
// SPDX-License-Identifier: MIT

/**
 * Settings for running the pipeline outside CI, read from the environment
 * under the same names the hosted actions take.
 * @module
 */

import { config as loadDotenv } from "dotenv";
import { z } from "zod";

import { ConfigError } from "../lib/errors.ts";
import { LogLevel, parseLogLevel } from "../lib/log.ts";

const RunEnv = z.object({
  AWS_S3_BUCKET: z.string().min(1),
  AWS_ACCESS_KEY_ID: z.string().min(1),
  AWS_SECRET_ACCESS_KEY: z.string().min(1),
  AWS_REGION: z.string().min(1),
  DISTRIBUTION_ID: z.string().min(1),
  DOCS_ARTIFACT_DIR: z.string().min(1).default(".artifacts"),
  LOG_LEVEL: z.enum(["debug", "info", "warn", "error"]).default("info"),
});

export interface RunConfig {
  bucket: string;
  region: string;
  credentials: {
    accessKeyId: string;
    secretAccessKey: string;
  };
  distributionId: string;
  artifactDir: string;
  logLevel: LogLevel;
}

export function loadRunConfig(
  env: Record<string, string | undefined> = process.env,
): RunConfig {
  const parsed = RunEnv.safeParse(env);
  if (!parsed.success) {
    throw new ConfigError(
      parsed.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`),
    );
  }
  const vars = parsed.data;
  return {
    bucket: vars.AWS_S3_BUCKET,
    region: vars.AWS_REGION,
    credentials: {
      accessKeyId: vars.AWS_ACCESS_KEY_ID,
      secretAccessKey: vars.AWS_SECRET_ACCESS_KEY,
    },
    distributionId: vars.DISTRIBUTION_ID,
    artifactDir: vars.DOCS_ARTIFACT_DIR,
    logLevel: parseLogLevel(vars.LOG_LEVEL),
  };
}

/**
 * Load a `.env` file into the process environment, if there is one.
 * Variables already set take precedence.
 */
export function loadEnvFile(path?: string): void {
  const result = loadDotenv(path ? { path } : {});
  if (result.error && path) {
    throw new ConfigError([`cannot read ${path}: ${result.error.message}`]);
  }
}
