// This file is part of LensKit.
// Copyright (C) 2018-2023 Boise State University
// Copyright (C) 2023-2025 Drexel University
// Licensed under the MIT license, see LICENSE.md for details.
// SPDX-License-Identifier: MIT

export type Stage = "config" | "trigger" | "build" | "publish" | "invalidate";

/**
 * Base class for failures of a pipeline stage.
 */
export class PipelineError extends Error {
  readonly stage: Stage;

  constructor(stage: Stage, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "PipelineError";
    this.stage = stage;
  }
}

export class ConfigError extends PipelineError {
  readonly issues: string[];

  constructor(issues: string[]) {
    super("config", `invalid configuration:\n  ${issues.join("\n  ")}`);
    this.name = "ConfigError";
    this.issues = issues;
  }
}

export class ReleaseVersionError extends PipelineError {
  constructor(ref: string) {
    super("trigger", `ref ${ref} yields an empty release version`);
    this.name = "ReleaseVersionError";
  }
}

export class BuildError extends PipelineError {
  readonly exitCode: number | null;

  constructor(
    message: string,
    exitCode: number | null = null,
    options?: { cause?: unknown },
  ) {
    super("build", message, options);
    this.name = "BuildError";
    this.exitCode = exitCode;
  }
}

export class PublishError extends PipelineError {
  constructor(message: string, options?: { cause?: unknown }) {
    super("publish", message, options);
    this.name = "PublishError";
  }
}

export class InvalidationError extends PipelineError {
  constructor(message: string, options?: { cause?: unknown }) {
    super("invalidate", message, options);
    this.name = "InvalidationError";
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
